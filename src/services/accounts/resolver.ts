/**
 * @fileoverview Builds the ordered list of accounts to brief.
 *
 * Explicit --personal/--work input wins outright; discovery only runs when
 * neither is given. A failed discovery yields no accounts instead of an
 * error, and the caller decides whether that is fatal.
 */

import type { Account } from '../../types/domain.js';
import { createLogger } from '../../utils/observability/index.js';
import { discoverAccounts, type DiscoveryDeps } from '../provider/discovery.js';
import { classifyAccount, DEFAULT_PERSONAL_DOMAINS } from './classifier.js';

const log = createLogger({ domain: 'account-resolver' });

export interface ExplicitAccounts {
  personal?: string;
  work?: string;
}

export interface ResolverDeps {
  discovery: DiscoveryDeps;
  personalDomains?: ReadonlySet<string>;
}

export function explicitAccounts(explicit: ExplicitAccounts): Account[] {
  const accounts: Account[] = [];
  if (explicit.personal) {
    accounts.push({ email: explicit.personal, classification: 'personal', source: 'explicit' });
  }
  if (explicit.work) {
    accounts.push({ email: explicit.work, classification: 'work', source: 'explicit' });
  }
  return accounts;
}

export async function resolveAccounts(
  explicit: ExplicitAccounts,
  deps: ResolverDeps
): Promise<Account[]> {
  const given = explicitAccounts(explicit);
  if (given.length > 0) {
    log.debug('accounts_resolved', { strategy: 'explicit', count: given.length });
    return given;
  }

  const discovered = await discoverAccounts(deps.discovery);
  if (!discovered.success) {
    log.warn('account_discovery_failed', { error: discovered.error.message });
    return [];
  }

  const personalDomains = deps.personalDomains ?? DEFAULT_PERSONAL_DOMAINS;
  const accounts = discovered.data.map((email): Account => ({
    email,
    classification: classifyAccount(email, personalDomains),
    source: 'discovered',
  }));
  log.debug('accounts_resolved', { strategy: 'discovery', count: accounts.length });
  return accounts;
}

/**
 * Append `secondary` accounts whose email (case-insensitive) is not
 * already in `primary`. Primary order is kept.
 */
export function mergeAccounts(primary: readonly Account[], secondary: readonly Account[]): Account[] {
  const seen = new Set(primary.map((account) => account.email.toLowerCase()));
  const merged = [...primary];
  for (const account of secondary) {
    const key = account.email.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    merged.push(account);
  }
  return merged;
}
