/**
 * Mail record kind descriptor.
 *
 * Weeks start on Sunday, "this week" runs through today, and a plain
 * "today" is sent to the provider as a relative 24h search.
 */

import type { RecordKind } from '../record-kind.js';
import { buildGmailArgs } from './providers/gog-gmail.js';
import { normalizeMessage } from './service/normalizer.js';
import type { MailRecord } from './types.js';

export const mailKind: RecordKind<MailRecord> = {
  name: 'mail',
  listField: 'messages',
  dateConvention: {
    weekStart: 'sunday',
    thisWeekEnd: 'progressive',
    defaultWindow: 'relative',
    relativeToken: 'newer_than:1d',
  },
  buildFetchArgs: buildGmailArgs,
  normalize: normalizeMessage,
};
