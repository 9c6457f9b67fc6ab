/**
 * @fileoverview Calendar event normalization.
 *
 * Maps one provider event onto CalendarRecord. A missing summary becomes
 * "(No title)" and times prefer dateTime over the all-day date.
 */

import {
  getRecord,
  getRecordList,
  getString,
} from '../../../services/records/accessors.js';
import type { AccountClassification, RawRecord } from '../../../types/domain.js';
import type { CalendarRecord } from '../types.js';

export const NO_TITLE = '(No title)';

/** `dateTime` when present, else the all-day `date`, else ''. */
export function eventTime(event: RawRecord, key: 'start' | 'end'): string {
  const time = getRecord(event, key);
  if (!time) return '';
  return getString(time, 'dateTime') || getString(time, 'date');
}

/** Response status of the attendee flagged `self`, or ''. */
export function extractMyResponse(event: RawRecord): string {
  const self = getRecordList(event, 'attendees').find((attendee) => attendee.self === true);
  return self ? getString(self, 'responseStatus') : '';
}

export function normalizeEvent(
  event: RawRecord,
  accountClassification: AccountClassification
): CalendarRecord {
  return {
    title: getString(event, 'summary') || NO_TITLE,
    start: eventTime(event, 'start'),
    end: eventTime(event, 'end'),
    location: getString(event, 'location'),
    status: getString(event, 'status'),
    response: extractMyResponse(event),
    accountClassification,
  };
}
