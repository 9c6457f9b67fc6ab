/**
 * Record kind contract.
 *
 * A record kind (calendar events, mail messages) plugs into the shared
 * pipeline through this descriptor: which envelope field the provider
 * uses, how the time window is interpreted, how the provider is invoked
 * and how one raw record is normalized.
 */

import type { DateConvention } from '../services/date/index.js';
import type {
  Account,
  AccountClassification,
  CanonicalRecordBase,
  QueryDescriptor,
  RawRecord,
} from '../types/domain.js';

export type RecordKindName = 'calendar' | 'mail';

export interface FetchArgOptions {
  maxResults: number;
  calendarId: string;
}

export interface RecordKind<R extends CanonicalRecordBase = CanonicalRecordBase> {
  name: RecordKindName;
  /** Field of the provider's JSON object that holds the record list */
  listField: string;
  dateConvention: DateConvention;
  buildFetchArgs(account: Account, query: QueryDescriptor, options: FetchArgOptions): string[];
  normalize(raw: RawRecord, classification: AccountClassification): R;
}
