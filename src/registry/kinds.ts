// Record kind registry (canonical source of truth).
//
// Every record kind the CLI can brief is listed here; the pipeline itself
// never names a kind directly.

import { calendarKind } from '../domains/calendar/capability.js';
import { mailKind } from '../domains/email/capability.js';
import type { RecordKind, RecordKindName } from '../domains/record-kind.js';

export const RECORD_KINDS: Record<RecordKindName, RecordKind> = {
  calendar: calendarKind,
  mail: mailKind,
};

export const RECORD_KIND_NAMES: readonly RecordKindName[] = ['calendar', 'mail'];

export function getRecordKind(name: RecordKindName): RecordKind {
  return RECORD_KINDS[name];
}

export function isRecordKindName(value: string): value is RecordKindName {
  return Object.prototype.hasOwnProperty.call(RECORD_KINDS, value);
}
