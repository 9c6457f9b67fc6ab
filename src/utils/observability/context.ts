/**
 * Per-run log context. Every record logged inside `withLogContext` carries
 * its fields (`runId`, `kind`) without passing them through each call.
 */

import { randomUUID } from 'crypto';
import { AsyncLocalStorage } from 'async_hooks';
import type { LogContext } from './types.js';

const runContext = new AsyncLocalStorage<LogContext>();

/** Run `fn` with `context` layered over the enclosing one. */
export function withLogContext<T>(context: LogContext, fn: () => T): T {
  return runContext.run({ ...getLogContext(), ...context }, fn);
}

export function getLogContext(): LogContext {
  return runContext.getStore() ?? {};
}

/** e.g. `brief_3f9a0c1d2e4b` */
export function createRunId(prefix = 'run'): string {
  return `${prefix}_${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}
