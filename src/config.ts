/**
 * @fileoverview Centralized application configuration.
 *
 * All environment variables are loaded and validated here. This provides
 * a single source of truth for configuration and makes it easy to see
 * what external configuration the tool requires.
 *
 * @see .env.example for the supported variables
 */

import 'dotenv/config';
import { DateTime } from 'luxon';
import { MAX_CONCURRENCY } from './utils/concurrency.js';
import { ConfigurationError } from './utils/errors.js';
import type { LogLevel } from './utils/observability/types.js';

// ---------------------------------------------------------------------------
// Config helpers: make required vs optional intent explicit
// ---------------------------------------------------------------------------

/** Read an optional string env var with a default. */
function optional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/** Read an optional integer env var with a default. */
function optionalInt(key: string, defaultValue: number): number {
  const raw = process.env[key];
  return raw ? parseInt(raw, 10) : defaultValue;
}

/** Read an env var that has no default. Empty strings count as unset. */
function maybe(key: string): string | undefined {
  const raw = process.env[key];
  return raw && raw.trim() ? raw.trim() : undefined;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

// ---------------------------------------------------------------------------
// Config object
// ---------------------------------------------------------------------------

const config = {
  /** External provider CLI used for discovery and fetching */
  provider: {
    bin: optional('BRIEF_PROVIDER_BIN', 'gog'),
    discoveryTimeoutMs: optionalInt('BRIEF_DISCOVERY_TIMEOUT_MS', 10000),
    fetchTimeoutMs: optionalInt('BRIEF_FETCH_TIMEOUT_MS', 30000),
    maxResults: optionalInt('BRIEF_MAX_RESULTS', 50),
    calendarId: optional('BRIEF_CALENDAR_ID', 'primary'),
  },

  /** Number of accounts fetched at once (1 = sequential) */
  concurrency: optionalInt('BRIEF_CONCURRENCY', 1),

  /** Optional JSON file listing accounts discovery cannot see */
  accountsFile: maybe('BRIEF_ACCOUNTS_FILE'),

  /** IANA zone for calendar-day math; undefined means the system zone */
  timezone: maybe('BRIEF_TIMEZONE'),

  /** Validated at startup; the logger reads BRIEF_LOG_LEVEL itself */
  logging: {
    level: optional('BRIEF_LOG_LEVEL', 'warn'),
  },
};

export type AppConfig = typeof config;

/**
 * Validate configuration at startup.
 * Throws if any value is out of range.
 */
export function validateConfig(): void {
  const errors: string[] = [];

  if (!config.provider.bin.trim()) {
    errors.push('BRIEF_PROVIDER_BIN must not be blank');
  }
  if (!(config.provider.discoveryTimeoutMs >= 1000)) {
    errors.push(`BRIEF_DISCOVERY_TIMEOUT_MS must be >= 1000, got ${config.provider.discoveryTimeoutMs}`);
  }
  if (!(config.provider.fetchTimeoutMs >= 1000)) {
    errors.push(`BRIEF_FETCH_TIMEOUT_MS must be >= 1000, got ${config.provider.fetchTimeoutMs}`);
  }
  if (!(config.provider.maxResults >= 1 && config.provider.maxResults <= 500)) {
    errors.push(`BRIEF_MAX_RESULTS must be 1-500, got ${config.provider.maxResults}`);
  }
  if (!(config.concurrency >= 1 && config.concurrency <= MAX_CONCURRENCY)) {
    errors.push(`BRIEF_CONCURRENCY must be 1-${MAX_CONCURRENCY}, got ${config.concurrency}`);
  }
  if (config.timezone && !DateTime.now().setZone(config.timezone).isValid) {
    errors.push(`BRIEF_TIMEZONE must be an IANA timezone, got "${config.timezone}"`);
  }
  if (!isLogLevel(config.logging.level)) {
    errors.push(`BRIEF_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${config.logging.level}"`);
  }

  if (errors.length > 0) {
    throw new ConfigurationError(
      `Configuration validation failed:\n  - ${errors.join('\n  - ')}`,
      'INVALID_CONFIG',
      { errors }
    );
  }
}

export default config;
