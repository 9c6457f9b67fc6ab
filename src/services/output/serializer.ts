/**
 * @fileoverview JSON rendering of a brief.
 *
 * Keys are written in a fixed order, `errors` only appears when an account
 * failed, and text is emitted as is (JSON.stringify does not HTML-escape).
 */

import type { AggregateResult, CanonicalRecordBase } from '../../types/domain.js';

const INDENT = 2;

export function serializeResult<R extends CanonicalRecordBase>(result: AggregateResult<R>): string {
  const document: Record<string, unknown> = {
    accounts: result.accounts.map((account) => ({
      email: account.email,
      classification: account.classification,
      source: account.source,
    })),
    records: result.records,
  };
  if (result.errors && result.errors.length > 0) {
    document.errors = result.errors.map((error) => ({ email: error.email, message: error.message }));
  }
  return `${JSON.stringify(document, null, INDENT)}\n`;
}

export function serializeError(message: string): string {
  return `${JSON.stringify({ error: message }, null, INDENT)}\n`;
}
