/**
 * @fileoverview Provider arguments for listing calendar events.
 *
 * `<bin> calendar events <calendarId> --json --max=N --account=E --from D --to D`
 */

import type { FetchArgOptions } from '../../record-kind.js';
import type { Account, QueryDescriptor } from '../../../types/domain.js';

export function calendarQueryArgs(query: QueryDescriptor): string[] {
  if (query.type === 'relative') {
    return [query.token];
  }
  return ['--from', query.from, '--to', query.to];
}

export function buildCalendarArgs(
  account: Account,
  query: QueryDescriptor,
  options: FetchArgOptions
): string[] {
  return [
    'calendar',
    'events',
    options.calendarId,
    '--json',
    `--max=${options.maxResults}`,
    `--account=${account.email}`,
    ...calendarQueryArgs(query),
  ];
}
