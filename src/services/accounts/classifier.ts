/**
 * @fileoverview Personal/work classification of account emails.
 *
 * Classification is by domain only: consumer mail providers are personal,
 * every other domain is work.
 */

import type { AccountClassification } from '../../types/domain.js';

export const DEFAULT_PERSONAL_DOMAINS: ReadonlySet<string> = new Set([
  'gmail.com',
  'naver.com',
  'daum.net',
  'hanmail.net',
  'yahoo.com',
  'hotmail.com',
  'outlook.com',
  'icloud.com',
  'kakao.com',
  'nate.com',
]);

/**
 * Classify an email address. Addresses without a domain are `work`.
 */
export function classifyAccount(
  email: string,
  personalDomains: ReadonlySet<string> = DEFAULT_PERSONAL_DOMAINS
): AccountClassification {
  const at = email.indexOf('@');
  if (at === -1) {
    return 'work';
  }
  const domain = email.slice(at + 1).toLowerCase();
  return personalDomains.has(domain) ? 'personal' : 'work';
}
