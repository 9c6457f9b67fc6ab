import { WriteStream, createWriteStream, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { getLogContext } from './context.js';
import { redactSecrets } from './redaction.js';
import type { AppLogger, AppLogRecord, LogContext, LogData, LogLevel } from './types.js';

// stdout carries the brief document, so every log line goes to stderr.

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let fileSink: { path: string; stream: WriteStream } | null = null;
let sinkHooksInstalled = false;

function thresholdLevel(): LogLevel {
  const raw = process.env.BRIEF_LOG_LEVEL;
  if (raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error') {
    return raw;
  }
  return 'warn';
}

function isEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[thresholdLevel()];
}

export function closeLogSinks(): void {
  if (!fileSink) return;
  fileSink.stream.end();
  fileSink = null;
}

function ensureFileSink(): WriteStream | null {
  const filePath = process.env.BRIEF_LOG_FILE;
  if (!filePath) return null;

  if (fileSink?.path === filePath) {
    return fileSink.stream;
  }

  closeLogSinks();

  const dir = dirname(filePath);
  try {
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    const stream = createWriteStream(filePath, { flags: 'a', encoding: 'utf-8' });
    stream.on('error', () => {
      // Logging must never change the exit status of a brief.
    });
    fileSink = { path: filePath, stream };
    if (!sinkHooksInstalled) {
      sinkHooksInstalled = true;
      process.once('exit', closeLogSinks);
    }
    return stream;
  } catch {
    return null;
  }
}

function toRecord(
  level: LogLevel,
  event: string,
  baseContext: LogContext,
  data?: LogData,
): AppLogRecord {
  const context = getLogContext();
  return {
    timestamp: new Date().toISOString(),
    level,
    event,
    ...context,
    ...baseContext,
    ...(data ? redactSecrets(data) : {}),
  };
}

function emitRecord(record: AppLogRecord): void {
  const line = JSON.stringify(record);
  process.stderr.write(`${line}\n`);
  ensureFileSink()?.write(`${line}\n`);
}

export function createLogger(baseContext: LogContext = {}): AppLogger {
  const log = (level: LogLevel, event: string, data?: LogData): void => {
    if (!isEnabled(level)) return;
    emitRecord(toRecord(level, event, baseContext, data));
  };

  return {
    debug: (event: string, data?: LogData) => log('debug', event, data),
    info: (event: string, data?: LogData) => log('info', event, data),
    warn: (event: string, data?: LogData) => log('warn', event, data),
    error: (event: string, data?: LogData) => log('error', event, data),
    child: (context: LogContext) => createLogger({ ...baseContext, ...context }),
  };
}
