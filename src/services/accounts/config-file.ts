/**
 * @fileoverview Accounts listed in a local JSON file.
 *
 * For accounts the provider cannot discover. File format:
 *
 *   { "accounts": [ { "email": "me@example.com", "type": "work" } ] }
 *
 * `type` is optional and falls back to domain classification. A missing
 * file means no extra accounts; a broken one is logged and skipped.
 */

import fs from 'fs/promises';
import type { Account, AccountClassification } from '../../types/domain.js';
import { errorMessage } from '../../utils/errors.js';
import { createLogger } from '../../utils/observability/index.js';
import { isRawRecord } from '../records/accessors.js';
import { classifyAccount, DEFAULT_PERSONAL_DOMAINS } from './classifier.js';

const log = createLogger({ domain: 'account-config' });

function isClassification(value: unknown): value is AccountClassification {
  return value === 'personal' || value === 'work';
}

function isMissingFileError(error: unknown): boolean {
  return isRawRecord(error) && error.code === 'ENOENT';
}

export function parseAccountsFile(
  content: string,
  personalDomains: ReadonlySet<string> = DEFAULT_PERSONAL_DOMAINS
): Account[] {
  const data: unknown = JSON.parse(content);
  if (!isRawRecord(data) || !Array.isArray(data.accounts)) {
    throw new Error('expected an object with an "accounts" array');
  }

  const accounts: Account[] = [];
  for (const entry of data.accounts) {
    if (!isRawRecord(entry) || typeof entry.email !== 'string' || !entry.email.trim()) {
      continue;
    }
    const email = entry.email.trim();
    accounts.push({
      email,
      classification: isClassification(entry.type) ? entry.type : classifyAccount(email, personalDomains),
      source: 'config',
    });
  }
  return accounts;
}

export async function loadConfiguredAccounts(
  filePath: string | undefined,
  personalDomains: ReadonlySet<string> = DEFAULT_PERSONAL_DOMAINS
): Promise<Account[]> {
  if (!filePath) {
    return [];
  }

  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error)) {
      log.debug('accounts_file_missing', { path: filePath });
    } else {
      log.warn('accounts_file_unreadable', { path: filePath, error: errorMessage(error) });
    }
    return [];
  }

  try {
    const accounts = parseAccountsFile(content, personalDomains);
    log.debug('accounts_file_loaded', { path: filePath, count: accounts.length });
    return accounts;
  } catch (error) {
    log.warn('accounts_file_invalid', { path: filePath, error: errorMessage(error) });
    return [];
  }
}
