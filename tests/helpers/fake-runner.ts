/**
 * In-process stand-in for the provider CLI.
 */

import type { CommandResult, CommandRunner } from '../../src/services/provider/runner.js';
import type { Account } from '../../src/types/domain.js';

export interface RecordedCall {
  bin: string;
  args: string[];
  timeoutMs: number;
}

export type FakeResponse = CommandResult | Error;

export function ok(stdout: string): CommandResult {
  return { exitCode: 0, stdout, stderr: '', timedOut: false };
}

export function failed(stderr: string, exitCode = 1): CommandResult {
  return { exitCode, stdout: '', stderr, timedOut: false };
}

export function timedOut(): CommandResult {
  return { exitCode: -1, stdout: '', stderr: '', timedOut: true };
}

/**
 * Build a runner that answers through `respond` and records every call.
 * Returning an Error makes the runner reject, as a failed spawn does.
 */
export function createFakeRunner(respond: (args: readonly string[]) => FakeResponse): {
  runner: CommandRunner;
  calls: RecordedCall[];
} {
  const calls: RecordedCall[] = [];
  const runner: CommandRunner = async (bin, args, options) => {
    calls.push({ bin, args: [...args], timeoutMs: options.timeoutMs });
    const response = respond(args);
    if (response instanceof Error) {
      throw response;
    }
    return response;
  };
  return { runner, calls };
}

/** `--account=<email>` value of a provider call, or undefined. */
export function accountArg(args: readonly string[]): string | undefined {
  const flag = args.find((arg) => arg.startsWith('--account='));
  return flag?.slice('--account='.length);
}

export function account(
  email: string,
  classification: Account['classification'] = 'work',
  source: Account['source'] = 'explicit'
): Account {
  return { email, classification, source };
}
