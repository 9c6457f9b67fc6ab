/**
 * @fileoverview Brief pipeline entry point.
 *
 * build the query window → resolve accounts → merge file-configured
 * accounts → fetch, normalize and merge per account.
 */

import type { AppConfig } from './config.js';
import type { RecordKindName } from './domains/record-kind.js';
import { getRecordKind } from './registry/kinds.js';
import { loadConfiguredAccounts } from './services/accounts/config-file.js';
import { mergeAccounts, resolveAccounts, type ExplicitAccounts } from './services/accounts/resolver.js';
import { aggregate } from './services/aggregator/index.js';
import { buildDateRange, selectWindowMode, type WindowFlags } from './services/date/index.js';
import type { CommandRunner } from './services/provider/runner.js';
import type { AggregateResult } from './types/domain.js';
import { ConfigurationError } from './utils/errors.js';
import { createLogger } from './utils/observability/index.js';

const log = createLogger({ domain: 'brief' });

export const NO_ACCOUNTS_MESSAGE =
  'No accounts found. Use --personal/--work, configure provider auth, or list accounts in BRIEF_ACCOUNTS_FILE.';

export interface BriefOptions extends ExplicitAccounts {
  kind: RecordKindName;
  window: WindowFlags;
  maxResults?: number;
  concurrency?: number;
  /** Reference time for window math; defaults to the current time */
  now?: Date;
}

export interface BriefDeps {
  config: AppConfig;
  runner?: CommandRunner;
}

/**
 * Run one brief.
 * @throws ConfigurationError when no account could be resolved
 * @throws InvalidDateError when `window.date` is not a calendar date
 */
export async function runBrief(options: BriefOptions, deps: BriefDeps): Promise<AggregateResult> {
  const { config, runner } = deps;
  const kind = getRecordKind(options.kind);

  // Validate the window before any provider call
  const query = buildDateRange(
    selectWindowMode(options.window),
    options.now ?? new Date(),
    kind.dateConvention,
    { timezone: config.timezone }
  );

  const resolved = await resolveAccounts(
    { personal: options.personal, work: options.work },
    { discovery: { bin: config.provider.bin, timeoutMs: config.provider.discoveryTimeoutMs, runner } }
  );
  const configured = await loadConfiguredAccounts(config.accountsFile);
  const accounts = mergeAccounts(resolved, configured);

  if (accounts.length === 0) {
    throw new ConfigurationError(NO_ACCOUNTS_MESSAGE, 'NO_ACCOUNTS');
  }

  log.info('brief_started', {
    kind: kind.name,
    accountCount: accounts.length,
    queryType: query.type,
  });

  return aggregate(accounts, query, kind, {
    concurrency: options.concurrency ?? config.concurrency,
    fetcher: {
      bin: config.provider.bin,
      timeoutMs: config.provider.fetchTimeoutMs,
      maxResults: options.maxResults ?? config.provider.maxResults,
      calendarId: config.provider.calendarId,
      runner,
    },
  });
}
