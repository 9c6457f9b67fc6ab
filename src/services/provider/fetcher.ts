/**
 * @fileoverview Per-account record fetching through the provider CLI.
 *
 * Each call is scoped to one account and returns a Result, so a failing
 * account never throws past the aggregator.
 */

import type { RecordKind } from '../../domains/record-kind.js';
import type { Account, QueryDescriptor, RawRecord } from '../../types/domain.js';
import { FetchError, ParseError, errorMessage, type Result } from '../../utils/errors.js';
import { createLogger } from '../../utils/observability/index.js';
import { isRawRecord } from '../records/accessors.js';
import { describeFailure, runCommand, type CommandResult, type CommandRunner } from './runner.js';

const log = createLogger({ domain: 'record-fetcher' });

export interface FetcherDeps {
  bin: string;
  timeoutMs: number;
  maxResults: number;
  calendarId: string;
  runner?: CommandRunner;
}

/**
 * Extract the record list from provider output.
 *
 * - `{ "<listField>": [...] }` → that list
 * - an object without that list → empty
 * - a bare array → used as is
 * Non-object list entries are dropped.
 */
export function parseEnvelope(stdout: string, listField: string): Result<RawRecord[], ParseError> {
  let data: unknown;
  try {
    data = JSON.parse(stdout);
  } catch (error) {
    return {
      success: false,
      error: new ParseError(`Failed to parse provider output: ${errorMessage(error)}`),
    };
  }

  if (Array.isArray(data)) {
    return { success: true, data: data.filter(isRawRecord) };
  }

  if (isRawRecord(data)) {
    const list = data[listField];
    return { success: true, data: Array.isArray(list) ? list.filter(isRawRecord) : [] };
  }

  return { success: false, error: new ParseError('Unexpected JSON format from provider') };
}

export async function fetchRecords(
  account: Account,
  query: QueryDescriptor,
  kind: RecordKind,
  deps: FetcherDeps
): Promise<Result<RawRecord[]>> {
  const runner = deps.runner ?? runCommand;
  const args = kind.buildFetchArgs(account, query, {
    maxResults: deps.maxResults,
    calendarId: deps.calendarId,
  });
  const startedAt = Date.now();

  let result: CommandResult;
  try {
    result = await runner(deps.bin, args, { timeoutMs: deps.timeoutMs });
  } catch (error) {
    return {
      success: false,
      error: new FetchError(errorMessage(error), { email: account.email }),
    };
  }

  if (result.timedOut || result.exitCode !== 0) {
    const message = describeFailure(deps.bin, result, deps.timeoutMs);
    log.warn('provider_fetch_failed', {
      email: account.email,
      exitCode: result.exitCode,
      timedOut: result.timedOut,
      durationMs: Date.now() - startedAt,
    });
    return {
      success: false,
      error: new FetchError(message, { email: account.email, exitCode: result.exitCode }),
    };
  }

  const parsed = parseEnvelope(result.stdout, kind.listField);
  if (!parsed.success) {
    log.warn('provider_output_unparseable', { email: account.email, kind: kind.name });
    return parsed;
  }

  log.debug('provider_fetch_succeeded', {
    email: account.email,
    count: parsed.data.length,
    durationMs: Date.now() - startedAt,
  });
  return parsed;
}
