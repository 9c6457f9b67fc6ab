/**
 * @fileoverview Time-window resolution for provider queries.
 *
 * Turns the requested window (today, this week, a given date, ...) into a
 * concrete QueryDescriptor. Uses Luxon so that every boundary is a
 * calendar-day boundary in the chosen zone, DST included.
 */

import { DateTime } from 'luxon';
import type { QueryDescriptor } from '../../types/domain.js';
import { ConfigurationError, InvalidDateError } from '../../utils/errors.js';
import { createLogger } from '../../utils/observability/index.js';

const log = createLogger({ domain: 'date-range' });

export type WeekStart = 'monday' | 'sunday';

/**
 * Per record kind date conventions.
 * - thisWeekEnd 'fixed': this week runs to the end of the calendar week
 * - thisWeekEnd 'progressive': this week runs through today
 * - defaultWindow 'relative': "today" is sent as `relativeToken`
 */
export interface DateConvention {
  weekStart: WeekStart;
  thisWeekEnd: 'fixed' | 'progressive';
  defaultWindow: 'interval' | 'relative';
  relativeToken?: string;
}

export type WindowMode =
  | { mode: 'date'; date: string }
  | { mode: 'next-week' }
  | { mode: 'last-week' }
  | { mode: 'this-week' }
  | { mode: 'yesterday' }
  | { mode: 'tomorrow' }
  | { mode: 'today' };

export interface WindowFlags {
  date?: string;
  nextWeek?: boolean;
  lastWeek?: boolean;
  thisWeek?: boolean;
  yesterday?: boolean;
  tomorrow?: boolean;
  today?: boolean;
}

export interface BuildDateRangeOptions {
  /** IANA zone; the system zone when omitted */
  timezone?: string;
}

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const DAY_FORMAT = 'yyyy-MM-dd';

/**
 * Pick one window when several flags are set.
 * Priority: date > next/last week > this week > yesterday/tomorrow > today.
 */
export function selectWindowMode(flags: WindowFlags): WindowMode {
  if (flags.date) return { mode: 'date', date: flags.date };
  if (flags.nextWeek) return { mode: 'next-week' };
  if (flags.lastWeek) return { mode: 'last-week' };
  if (flags.thisWeek) return { mode: 'this-week' };
  if (flags.yesterday) return { mode: 'yesterday' };
  if (flags.tomorrow) return { mode: 'tomorrow' };
  return { mode: 'today' };
}

function daysSinceWeekStart(day: DateTime, weekStart: WeekStart): number {
  // Luxon weekdays run 1 (Monday) .. 7 (Sunday)
  return weekStart === 'monday' ? day.weekday - 1 : day.weekday % 7;
}

function interval(from: DateTime, to: DateTime): QueryDescriptor {
  return { type: 'interval', from: from.toFormat(DAY_FORMAT), to: to.toFormat(DAY_FORMAT) };
}

function parseExplicitDate(value: string, timezone?: string): DateTime {
  if (!ISO_DATE_PATTERN.test(value)) {
    throw new InvalidDateError(value);
  }
  const parsed = DateTime.fromISO(value, timezone ? { zone: timezone } : {});
  if (!parsed.isValid) {
    throw new InvalidDateError(value);
  }
  return parsed.startOf('day');
}

function resolveWindow(
  window: WindowMode,
  today: DateTime,
  convention: DateConvention,
  timezone?: string
): QueryDescriptor {
  const weekStart = today.minus({ days: daysSinceWeekStart(today, convention.weekStart) });

  switch (window.mode) {
    case 'date': {
      const day = parseExplicitDate(window.date, timezone);
      return interval(day, day.plus({ days: 1 }));
    }
    case 'next-week': {
      const next = weekStart.plus({ days: 7 });
      return interval(next, next.plus({ days: 7 }));
    }
    case 'last-week':
      return interval(weekStart.minus({ days: 7 }), weekStart);
    case 'this-week': {
      const end = convention.thisWeekEnd === 'fixed' ? weekStart.plus({ days: 7 }) : today.plus({ days: 1 });
      return interval(weekStart, end);
    }
    case 'yesterday':
      return interval(today.minus({ days: 1 }), today);
    case 'tomorrow':
      return interval(today.plus({ days: 1 }), today.plus({ days: 2 }));
    case 'today':
      if (convention.defaultWindow === 'relative' && convention.relativeToken) {
        return { type: 'relative', token: convention.relativeToken };
      }
      return interval(today, today.plus({ days: 1 }));
  }
}

/**
 * Build the query descriptor for a window relative to `referenceNow`.
 */
export function buildDateRange(
  window: WindowMode,
  referenceNow: Date,
  convention: DateConvention,
  options: BuildDateRangeOptions = {}
): QueryDescriptor {
  const { timezone } = options;
  const today = DateTime.fromJSDate(referenceNow, timezone ? { zone: timezone } : {}).startOf('day');
  if (!today.isValid) {
    throw new ConfigurationError(`Invalid timezone: "${timezone ?? ''}"`);
  }

  const descriptor = resolveWindow(window, today, convention, timezone);
  log.debug('date_range_built', {
    mode: window.mode,
    weekStart: convention.weekStart,
    query: descriptor.type === 'interval' ? `${descriptor.from}..${descriptor.to}` : descriptor.token,
  });
  return descriptor;
}
