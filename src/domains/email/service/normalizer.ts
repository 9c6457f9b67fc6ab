/**
 * @fileoverview Mail message normalization.
 */

import { getString, getStringList } from '../../../services/records/accessors.js';
import type { AccountClassification, RawRecord } from '../../../types/domain.js';
import type { MailRecord, ParsedSender } from '../types.js';

export const NO_SUBJECT = '(No subject)';
export const UNREAD_LABEL = 'UNREAD';

/**
 * Split a From header of the form `Display Name <user@example.com>`.
 * Without an angle-bracket pair the whole value is used as both name and
 * address; the address is not validated.
 */
export function parseFrom(raw: string): ParsedSender {
  const value = raw.trim();
  const open = value.indexOf('<');
  const close = open === -1 ? -1 : value.indexOf('>', open + 1);

  if (open === -1 || close === -1) {
    return { name: value, email: value };
  }

  return {
    name: value.slice(0, open).trim(),
    email: value.slice(open + 1, close).trim(),
  };
}

export function normalizeMessage(
  message: RawRecord,
  accountClassification: AccountClassification
): MailRecord {
  const sender = parseFrom(getString(message, 'from'));
  const rawLabels = getStringList(message, 'labels');

  return {
    date: getString(message, 'date'),
    subject: getString(message, 'subject') || NO_SUBJECT,
    fromName: sender.name,
    fromEmail: sender.email,
    labels: rawLabels.filter((label) => label !== UNREAD_LABEL),
    isUnread: rawLabels.includes(UNREAD_LABEL),
    accountClassification,
  };
}
