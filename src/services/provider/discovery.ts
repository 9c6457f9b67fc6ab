/**
 * @fileoverview Account discovery through the provider CLI.
 *
 * `<bin> auth list --json` → `{"accounts":[{"email": "..."}]}`
 */

import type { Result } from '../../utils/errors.js';
import { DiscoveryError, errorMessage } from '../../utils/errors.js';
import { isRawRecord } from '../records/accessors.js';
import { describeFailure, runCommand, type CommandResult, type CommandRunner } from './runner.js';

export const DISCOVERY_ARGS: readonly string[] = ['auth', 'list', '--json'];

export interface DiscoveryDeps {
  bin: string;
  timeoutMs: number;
  runner?: CommandRunner;
}

export function parseDiscoveryOutput(stdout: string): Result<string[], DiscoveryError> {
  let data: unknown;
  try {
    data = JSON.parse(stdout);
  } catch (error) {
    return {
      success: false,
      error: new DiscoveryError(`Failed to parse account list: ${errorMessage(error)}`),
    };
  }

  if (!isRawRecord(data) || !Array.isArray(data.accounts)) {
    return { success: false, error: new DiscoveryError('Account list has no "accounts" array') };
  }

  const emails = data.accounts
    .filter(isRawRecord)
    .map((entry) => entry.email)
    .filter((email): email is string => typeof email === 'string' && email.length > 0);

  return { success: true, data: emails };
}

/**
 * List the emails the provider is authenticated for, in provider order.
 */
export async function discoverAccounts(deps: DiscoveryDeps): Promise<Result<string[], DiscoveryError>> {
  const runner = deps.runner ?? runCommand;

  let result: CommandResult;
  try {
    result = await runner(deps.bin, DISCOVERY_ARGS, { timeoutMs: deps.timeoutMs });
  } catch (error) {
    return { success: false, error: new DiscoveryError(errorMessage(error)) };
  }

  if (result.timedOut || result.exitCode !== 0) {
    return {
      success: false,
      error: new DiscoveryError(describeFailure(deps.bin, result, deps.timeoutMs), {
        exitCode: result.exitCode,
      }),
    };
  }

  return parseDiscoveryOutput(result.stdout);
}
