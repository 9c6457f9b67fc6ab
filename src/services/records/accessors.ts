/**
 * @fileoverview Total accessors over provider records.
 *
 * Provider output is untyped JSON. Every accessor returns a default on a
 * missing key or a type mismatch and never throws.
 */

import type { RawRecord } from '../../types/domain.js';

export function isRawRecord(value: unknown): value is RawRecord {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** String value of `key`, or '' when absent or not a string. */
export function getString(record: RawRecord, key: string): string {
  const value = record[key];
  return typeof value === 'string' ? value : '';
}

/** Nested object at `key`, or null. */
export function getRecord(record: RawRecord, key: string): RawRecord | null {
  const value = record[key];
  return isRawRecord(value) ? value : null;
}

/** Array at `key`, or an empty array. */
export function getArray(record: RawRecord, key: string): unknown[] {
  const value = record[key];
  return Array.isArray(value) ? value : [];
}

/** String entries of the array at `key`; other entries are skipped. */
export function getStringList(record: RawRecord, key: string): string[] {
  return getArray(record, key).filter((item): item is string => typeof item === 'string');
}

/** Object entries of the array at `key`; other entries are skipped. */
export function getRecordList(record: RawRecord, key: string): RawRecord[] {
  return getArray(record, key).filter(isRawRecord);
}

/** Strictly `true` only for the boolean `true`. */
export function getFlag(record: RawRecord, key: string): boolean {
  return record[key] === true;
}
