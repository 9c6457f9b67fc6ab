/**
 * @fileoverview Bounded subprocess execution for the provider CLI.
 *
 * The runner never rejects for a non-zero exit or a timeout; those are
 * reported on the result so callers can turn them into per-account errors.
 * It only rejects when the process cannot be started at all.
 */

import { spawn } from 'child_process';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface CommandOptions {
  timeoutMs: number;
}

/**
 * Runs one command. Swappable so tests can stand in for the provider.
 */
export type CommandRunner = (
  bin: string,
  args: readonly string[],
  options: CommandOptions
) => Promise<CommandResult>;

export const runCommand: CommandRunner = (bin, args, options) =>
  new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(bin, [...args], { stdio: ['ignore', 'pipe', 'pipe'] });

    let stdout = '';
    let stderr = '';
    let timedOut = false;

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill('SIGKILL');
    }, options.timeoutMs);

    child.once('error', (error) => {
      clearTimeout(timer);
      reject(error);
    });

    child.once('close', (code) => {
      clearTimeout(timer);
      resolve({
        exitCode: code ?? -1,
        stdout,
        stderr,
        timedOut,
      });
    });
  });

/**
 * Message for a failed run: trimmed diagnostics, else a generic exit line.
 */
export function describeFailure(bin: string, result: CommandResult, timeoutMs: number): string {
  if (result.timedOut) {
    return `${bin} timed out after ${timeoutMs}ms`;
  }
  const diagnostic = result.stderr.trim();
  return diagnostic || `${bin} exited with code ${result.exitCode}`;
}
