/**
 * Calendar record kind descriptor.
 *
 * Weeks start on Monday and "this week" covers the whole calendar week.
 */

import type { RecordKind } from '../record-kind.js';
import { buildCalendarArgs } from './providers/gog-calendar.js';
import { normalizeEvent } from './service/normalizer.js';
import type { CalendarRecord } from './types.js';

export const calendarKind: RecordKind<CalendarRecord> = {
  name: 'calendar',
  listField: 'events',
  dateConvention: {
    weekStart: 'monday',
    thisWeekEnd: 'fixed',
    defaultWindow: 'interval',
  },
  buildFetchArgs: buildCalendarArgs,
  normalize: normalizeEvent,
};
