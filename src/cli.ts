/**
 * @fileoverview Command-line surface of the brief.
 *
 *   account-brief calendar --this-week
 *   account-brief mail --personal me@gmail.com --work me@example.com --yesterday
 *   account-brief mail --date 2024-01-10
 *
 * stdout only ever carries one JSON document; diagnostics and --help go to
 * stderr.
 */

import yargs from 'yargs';
import { runBrief, type BriefOptions } from './brief.js';
import type { AppConfig } from './config.js';
import { isRecordKindName, RECORD_KIND_NAMES } from './registry/kinds.js';
import type { CommandRunner } from './services/provider/runner.js';
import { serializeError, serializeResult } from './services/output/serializer.js';
import { MAX_CONCURRENCY } from './utils/concurrency.js';
import { AppError, UsageError, errorMessage } from './utils/errors.js';
import { createLogger, createRunId, withLogContext } from './utils/observability/index.js';

const log = createLogger({ domain: 'cli' });

function intInRange(name: string, value: number | undefined, max?: number): number | undefined {
  if (value === undefined) return undefined;
  if (!Number.isInteger(value) || value < 1 || (max !== undefined && value > max)) {
    const range = max === undefined ? 'a positive integer' : `an integer from 1 to ${max}`;
    throw new UsageError(`--${name} must be ${range}, got ${value}`);
  }
  return value;
}

// A repeated flag reaches coerce as an array; every flag here takes one value.
function onceString(name: string) {
  return (value: unknown): string => {
    if (typeof value !== 'string') {
      throw new UsageError(`--${name} may only be given once`);
    }
    return value;
  };
}

function onceNumber(name: string) {
  return (value: unknown): number => {
    if (typeof value !== 'number') {
      throw new UsageError(`--${name} may only be given once`);
    }
    return value;
  };
}

function buildParser(argv: readonly string[]) {
  return yargs([...argv])
    .scriptName('account-brief')
    .usage('$0 <calendar|mail> [options]')
    .option('personal', {
      type: 'string',
      coerce: onceString('personal'),
      describe: 'Personal account email (skips discovery)',
    })
    .option('work', {
      type: 'string',
      coerce: onceString('work'),
      describe: 'Work account email (skips discovery)',
    })
    .option('today', { type: 'boolean', describe: 'Today (default)' })
    .option('yesterday', { type: 'boolean', describe: 'Yesterday' })
    .option('tomorrow', { type: 'boolean', describe: 'Tomorrow' })
    .option('this-week', { type: 'boolean', describe: 'This week' })
    .option('next-week', { type: 'boolean', describe: 'Next week' })
    .option('last-week', { type: 'boolean', describe: 'Last week' })
    .option('date', { type: 'string', coerce: onceString('date'), describe: 'A single day (YYYY-MM-DD)' })
    .option('max', { type: 'number', coerce: onceNumber('max'), describe: 'Maximum records per account' })
    .option('concurrency', {
      type: 'number',
      coerce: onceNumber('concurrency'),
      describe: `Accounts fetched at once (1-${MAX_CONCURRENCY})`,
    })
    .demandCommand(1, `Specify a record kind: ${RECORD_KIND_NAMES.join(' or ')}`)
    .strictOptions()
    .version(false)
    .help()
    .alias('help', 'h')
    .exitProcess(false)
    .fail((message: string | undefined, error: Error | undefined) => {
      throw new UsageError(message || (error ? error.message : 'Invalid arguments'));
    });
}

export function isHelpRequest(argv: readonly string[]): boolean {
  return argv.includes('--help') || argv.includes('-h');
}

/** Usage text, handed to `write` instead of being printed to stdout. */
export function renderHelp(write: (chunk: string) => void): void {
  buildParser([]).showHelp((text) => write(`${text}\n`));
}

/**
 * Parse CLI arguments (without the node/script prefix) into brief options.
 * @throws UsageError for unknown or repeated flags, a missing or unknown kind, or bad numbers
 */
export function parseCliArgs(argv: readonly string[]): BriefOptions {
  const parsed = buildParser(argv).parseSync();

  const kind = String(parsed._[0]);
  if (!isRecordKindName(kind)) {
    throw new UsageError(`Unknown record kind "${kind}". Use ${RECORD_KIND_NAMES.join(' or ')}`);
  }
  if (parsed._.length > 1) {
    throw new UsageError(`Unexpected argument: ${String(parsed._[1])}`);
  }

  return {
    kind,
    personal: parsed.personal || undefined,
    work: parsed.work || undefined,
    window: {
      date: parsed.date || undefined,
      nextWeek: parsed['next-week'],
      lastWeek: parsed['last-week'],
      thisWeek: parsed['this-week'],
      yesterday: parsed.yesterday,
      tomorrow: parsed.tomorrow,
      today: parsed.today,
    },
    maxResults: intInRange('max', parsed.max),
    concurrency: intInRange('concurrency', parsed.concurrency, MAX_CONCURRENCY),
  };
}

export interface CliDeps {
  config: AppConfig;
  runner?: CommandRunner;
  write?: (chunk: string) => void;
  /** Receives --help output; stderr by default */
  writeHelp?: (chunk: string) => void;
  now?: Date;
}

/**
 * Run the CLI and return the process exit code.
 *
 * 0: brief written, including when some accounts failed, or help shown
 * 1: `{"error": ...}` written for missing accounts, bad input or a crash
 */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  const write = deps.write ?? ((chunk: string) => void process.stdout.write(chunk));

  return withLogContext({ runId: createRunId('brief') }, async () => {
    try {
      if (isHelpRequest(argv)) {
        renderHelp(deps.writeHelp ?? ((chunk: string) => void process.stderr.write(chunk)));
        return 0;
      }
      const options = parseCliArgs(argv);
      const result = await withLogContext({ kind: options.kind }, () =>
        runBrief({ ...options, now: deps.now }, { config: deps.config, runner: deps.runner })
      );
      write(serializeResult(result));
      return 0;
    } catch (error) {
      if (error instanceof AppError) {
        log.warn('brief_aborted', { code: error.code, error: error.message });
      } else {
        log.error('brief_failed', { error });
      }
      write(serializeError(errorMessage(error)));
      return 1;
    }
  });
}
