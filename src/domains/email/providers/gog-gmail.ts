/**
 * @fileoverview Provider arguments for searching mail.
 *
 * `<bin> gmail messages search <query> --json --max=N --account=E`
 */

import type { FetchArgOptions } from '../../record-kind.js';
import type { Account, QueryDescriptor } from '../../../types/domain.js';

/** Gmail search syntax wants slashes in dates. */
function searchDate(isoDate: string): string {
  return isoDate.replace(/-/g, '/');
}

export function buildSearchQuery(query: QueryDescriptor): string {
  if (query.type === 'relative') {
    return query.token;
  }
  return `after:${searchDate(query.from)} before:${searchDate(query.to)}`;
}

export function buildGmailArgs(
  account: Account,
  query: QueryDescriptor,
  options: FetchArgOptions
): string[] {
  return [
    'gmail',
    'messages',
    'search',
    buildSearchQuery(query),
    '--json',
    `--max=${options.maxResults}`,
    `--account=${account.email}`,
  ];
}
