/**
 * @fileoverview Standardized error handling utilities.
 *
 * - AppError: base class for application-specific errors
 * - Fatal errors (configuration, usage) end the run with exit code 1
 * - Recoverable errors (discovery, fetch, parse) are isolated per account
 * - Result: returned instead of throwing where the caller handles both cases
 */

/**
 * Base class for application-specific errors.
 * Includes error code, recoverability flag, and optional context.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly recoverable: boolean = false,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/** No accounts could be resolved, or the environment is misconfigured. */
export class ConfigurationError extends AppError {
  constructor(message: string, code: 'NO_ACCOUNTS' | 'INVALID_CONFIG' = 'INVALID_CONFIG', context?: Record<string, unknown>) {
    super(message, code, false, context);
    this.name = 'ConfigurationError';
  }
}

/** Bad command-line input. */
export class UsageError extends AppError {
  constructor(message: string) {
    super(message, 'USAGE', false);
    this.name = 'UsageError';
  }
}

export class InvalidDateError extends AppError {
  constructor(public readonly value: string) {
    super(`Invalid date format: ${value}. Use YYYY-MM-DD`, 'INVALID_DATE', false, { value });
    this.name = 'InvalidDateError';
  }
}

/** Account discovery failed. The resolver degrades to an empty list. */
export class DiscoveryError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'DISCOVERY_FAILED', true, context);
    this.name = 'DiscoveryError';
  }
}

/** The provider process failed, timed out or could not be started. */
export class FetchError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'FETCH_FAILED', true, context);
    this.name = 'FetchError';
  }
}

/** The provider answered with output of an unexpected shape. */
export class ParseError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'PARSE_FAILED', true, context);
    this.name = 'ParseError';
  }
}

/**
 * Result type for operations that may fail.
 * Prefer this over try-catch when callers need to handle both cases.
 */
export type Result<T, E = AppError> =
  | { success: true; data: T }
  | { success: false; error: E };

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
