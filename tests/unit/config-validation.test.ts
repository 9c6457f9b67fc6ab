import { afterEach, describe, expect, it, vi } from 'vitest';

const CONFIG_KEYS = [
  'BRIEF_PROVIDER_BIN',
  'BRIEF_DISCOVERY_TIMEOUT_MS',
  'BRIEF_FETCH_TIMEOUT_MS',
  'BRIEF_MAX_RESULTS',
  'BRIEF_CONCURRENCY',
  'BRIEF_CALENDAR_ID',
  'BRIEF_ACCOUNTS_FILE',
  'BRIEF_TIMEZONE',
  'BRIEF_LOG_LEVEL',
];

const ORIGINAL_ENV = new Map<string, string | undefined>(CONFIG_KEYS.map((key) => [key, process.env[key]]));

async function importConfigWith(overrides: Record<string, string | undefined>) {
  vi.resetModules();

  for (const key of CONFIG_KEYS) {
    delete process.env[key];
  }
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      process.env[key] = value;
    }
  }

  return import('../../src/config.js');
}

describe('config', () => {
  afterEach(() => {
    for (const key of CONFIG_KEYS) {
      const original = ORIGINAL_ENV.get(key);
      if (original === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = original;
      }
    }
    vi.resetModules();
  });

  it('applies defaults', async () => {
    const { default: config, validateConfig } = await importConfigWith({});

    expect(config.provider).toEqual({
      bin: 'gog',
      discoveryTimeoutMs: 10000,
      fetchTimeoutMs: 30000,
      maxResults: 50,
      calendarId: 'primary',
    });
    expect(config.concurrency).toBe(1);
    expect(config.accountsFile).toBeUndefined();
    expect(config.timezone).toBeUndefined();
    expect(config.logging.level).toBe('warn');
    expect(() => validateConfig()).not.toThrow();
  });

  it('reads overrides', async () => {
    const { default: config, validateConfig } = await importConfigWith({
      BRIEF_PROVIDER_BIN: '/opt/bin/gog',
      BRIEF_MAX_RESULTS: '200',
      BRIEF_CONCURRENCY: '4',
      BRIEF_ACCOUNTS_FILE: ' ./accounts.json ',
      BRIEF_TIMEZONE: 'Asia/Seoul',
    });

    expect(config.provider.bin).toBe('/opt/bin/gog');
    expect(config.provider.maxResults).toBe(200);
    expect(config.concurrency).toBe(4);
    expect(config.accountsFile).toBe('./accounts.json');
    expect(config.timezone).toBe('Asia/Seoul');
    expect(() => validateConfig()).not.toThrow();
  });

  it('rejects out-of-range numbers', async () => {
    const { validateConfig } = await importConfigWith({ BRIEF_MAX_RESULTS: '0', BRIEF_CONCURRENCY: '9' });

    expect(() => validateConfig()).toThrow('BRIEF_MAX_RESULTS must be 1-500, got 0');
    expect(() => validateConfig()).toThrow('BRIEF_CONCURRENCY must be 1-8, got 9');
  });

  it('rejects non-numeric values', async () => {
    const { validateConfig } = await importConfigWith({ BRIEF_FETCH_TIMEOUT_MS: 'soon' });

    expect(() => validateConfig()).toThrow('BRIEF_FETCH_TIMEOUT_MS must be >= 1000, got NaN');
  });

  it('rejects an unknown timezone', async () => {
    const { validateConfig } = await importConfigWith({ BRIEF_TIMEZONE: 'Mars/Olympus' });

    expect(() => validateConfig()).toThrow('BRIEF_TIMEZONE must be an IANA timezone, got "Mars/Olympus"');
  });

  it('rejects an unknown log level', async () => {
    const { validateConfig } = await importConfigWith({ BRIEF_LOG_LEVEL: 'verbose' });

    expect(() => validateConfig()).toThrow('BRIEF_LOG_LEVEL must be one of debug, info, warn, error, got "verbose"');
  });

  it('reports every problem at once', async () => {
    const { validateConfig } = await importConfigWith({ BRIEF_MAX_RESULTS: '501', BRIEF_LOG_LEVEL: 'loud' });

    let message = '';
    try {
      validateConfig();
    } catch (error) {
      message = error instanceof Error ? error.message : '';
    }
    expect(message).toBe(
      'Configuration validation failed:\n' +
        '  - BRIEF_MAX_RESULTS must be 1-500, got 501\n' +
        '  - BRIEF_LOG_LEVEL must be one of debug, info, warn, error, got "loud"'
    );
  });
});
