/**
 * @fileoverview Multi-account aggregation.
 *
 * Fetches and normalizes records for every account and merges them into
 * one result in account order. A failing account contributes an
 * AccountError and never stops the others.
 */

import type { RecordKind } from '../../domains/record-kind.js';
import type {
  Account,
  AccountError,
  AggregateResult,
  CanonicalRecordBase,
  QueryDescriptor,
} from '../../types/domain.js';
import { mapWithConcurrency } from '../../utils/concurrency.js';
import { createLogger } from '../../utils/observability/index.js';
import { fetchRecords, type FetcherDeps } from '../provider/fetcher.js';

const log = createLogger({ domain: 'aggregator' });

export interface AggregatorDeps {
  fetcher: FetcherDeps;
  /** Accounts fetched at once; 1 keeps the run sequential */
  concurrency?: number;
}

type AccountOutcome<R> =
  | { ok: true; records: R[] }
  | { ok: false; error: AccountError };

export async function aggregate<R extends CanonicalRecordBase>(
  accounts: readonly Account[],
  query: QueryDescriptor,
  kind: RecordKind<R>,
  deps: AggregatorDeps
): Promise<AggregateResult<R>> {
  const outcomes = await mapWithConcurrency(
    accounts,
    deps.concurrency ?? 1,
    async (account): Promise<AccountOutcome<R>> => {
      const fetched = await fetchRecords(account, query, kind, deps.fetcher);
      if (!fetched.success) {
        return { ok: false, error: { email: account.email, message: fetched.error.message } };
      }
      return {
        ok: true,
        records: fetched.data.map((raw) => kind.normalize(raw, account.classification)),
      };
    }
  );

  const records: R[] = [];
  const errors: AccountError[] = [];
  for (const outcome of outcomes) {
    if (outcome.ok) {
      records.push(...outcome.records);
    } else {
      errors.push(outcome.error);
    }
  }

  log.info('aggregate_completed', {
    kind: kind.name,
    accountCount: accounts.length,
    recordCount: records.length,
    errorCount: errors.length,
  });

  const result: AggregateResult<R> = { accounts: [...accounts], records };
  if (errors.length > 0) {
    result.errors = errors;
  }
  return result;
}
