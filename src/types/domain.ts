/**
 * Shared domain types for the account brief pipeline.
 *
 * Record-kind specific shapes live under src/domains/<kind>/types.ts;
 * everything here is common to every kind.
 */

export type AccountClassification = 'personal' | 'work';

/** Where an account entry came from. */
export type AccountSource = 'explicit' | 'discovered' | 'config';

export interface Account {
  email: string;
  classification: AccountClassification;
  source: AccountSource;
}

/**
 * What the provider is asked for. Intervals are half-open calendar-day
 * ranges `[from, to)` formatted as YYYY-MM-DD.
 */
export type QueryDescriptor =
  | { type: 'interval'; from: string; to: string }
  | { type: 'relative'; token: string };

/** One provider record, schema owned by the provider. */
export type RawRecord = Record<string, unknown>;

/** Every canonical record carries the classification of its account. */
export interface CanonicalRecordBase {
  accountClassification: AccountClassification;
}

export interface AccountError {
  email: string;
  message: string;
}

export interface AggregateResult<R extends CanonicalRecordBase = CanonicalRecordBase> {
  accounts: Account[];
  records: R[];
  errors?: AccountError[];
}
