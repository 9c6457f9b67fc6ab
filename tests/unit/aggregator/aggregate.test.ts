import { describe, expect, it } from 'vitest';
import { calendarKind } from '../../../src/domains/calendar/capability.js';
import { mailKind } from '../../../src/domains/email/capability.js';
import { aggregate } from '../../../src/services/aggregator/index.js';
import type { CommandRunner } from '../../../src/services/provider/runner.js';
import type { QueryDescriptor } from '../../../src/types/domain.js';
import { account, accountArg, createFakeRunner, failed, ok } from '../../helpers/fake-runner.js';

const TODAY: QueryDescriptor = { type: 'relative', token: 'newer_than:1d' };
const WEEK: QueryDescriptor = { type: 'interval', from: '2024-01-08', to: '2024-01-15' };

function fetcherWith(runner: CommandRunner) {
  return { bin: 'gog', timeoutMs: 30000, maxResults: 50, calendarId: 'primary', runner };
}

function inbox(subject: string): string {
  return JSON.stringify({
    messages: [{ subject, from: 'sender@example.com', date: '2024-01-10', labels: ['INBOX'] }],
  });
}

describe('aggregate', () => {
  it('keeps records of healthy accounts when another fails', async () => {
    const { runner } = createFakeRunner((args) =>
      accountArg(args) === 'me@example.com' ? failed('token expired') : ok(inbox('Hello'))
    );

    const result = await aggregate(
      [account('me@gmail.com', 'personal'), account('me@example.com', 'work')],
      TODAY,
      mailKind,
      { fetcher: fetcherWith(runner) }
    );

    expect(result).toEqual({
      accounts: [account('me@gmail.com', 'personal'), account('me@example.com', 'work')],
      records: [
        {
          date: '2024-01-10',
          subject: 'Hello',
          fromName: 'sender@example.com',
          fromEmail: 'sender@example.com',
          labels: ['INBOX'],
          isUnread: false,
          accountClassification: 'personal',
        },
      ],
      errors: [{ email: 'me@example.com', message: 'token expired' }],
    });
  });

  it('tags each record with its account classification', async () => {
    const { runner } = createFakeRunner(() =>
      ok('{"events":[{"summary":"Sync"},{"summary":"Lunch"}]}')
    );

    const result = await aggregate(
      [account('me@gmail.com', 'personal'), account('me@example.com', 'work')],
      WEEK,
      calendarKind,
      { fetcher: fetcherWith(runner) }
    );

    expect(result.records.map((record) => [record.title, record.accountClassification])).toEqual([
      ['Sync', 'personal'],
      ['Lunch', 'personal'],
      ['Sync', 'work'],
      ['Lunch', 'work'],
    ]);
    expect(result).not.toHaveProperty('errors');
  });

  it('merges in account order when fetched concurrently', async () => {
    const delays: Record<string, number> = { 'a@example.com': 30, 'b@example.com': 1, 'c@example.com': 10 };
    const runner: CommandRunner = async (_bin, args) => {
      const email = accountArg(args) ?? '';
      await new Promise((resolve) => setTimeout(resolve, delays[email]));
      return ok(inbox(email));
    };

    const result = await aggregate(
      [account('a@example.com'), account('b@example.com'), account('c@example.com')],
      TODAY,
      mailKind,
      { fetcher: fetcherWith(runner), concurrency: 3 }
    );

    expect(result.records.map((record) => record.subject)).toEqual([
      'a@example.com',
      'b@example.com',
      'c@example.com',
    ]);
  });

  it('lists errors in account order', async () => {
    const { runner } = createFakeRunner((args) => failed(`no access for ${accountArg(args) ?? ''}`));

    const result = await aggregate([account('a@example.com'), account('b@example.com')], WEEK, calendarKind, {
      fetcher: fetcherWith(runner),
      concurrency: 2,
    });

    expect(result.records).toEqual([]);
    expect(result.errors).toEqual([
      { email: 'a@example.com', message: 'no access for a@example.com' },
      { email: 'b@example.com', message: 'no access for b@example.com' },
    ]);
  });

  it('returns an empty result for no accounts', async () => {
    const { runner, calls } = createFakeRunner(() => ok('[]'));

    const result = await aggregate([], WEEK, calendarKind, { fetcher: fetcherWith(runner) });

    expect(result).toEqual({ accounts: [], records: [] });
    expect(calls).toHaveLength(0);
  });
});
