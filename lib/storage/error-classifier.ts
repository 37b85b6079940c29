/**
 * Persistence Error Classification
 *
 * Turns whatever the store threw into a structured description the caller
 * can act on, and decides whether repeating the operation could help.
 */

import {
  ConnectivityError,
  ConstraintViolation,
  PipelineError,
  SchemaViolation,
  type ConstraintKind,
} from '@/lib/errors';

// ============================================
// Types
// ============================================

export type PersistenceErrorCategory =
  | 'constraint_violation'
  | 'connectivity'
  | 'data_validation'
  | 'unknown';

export type SuggestedAction =
  | 'check_data_integrity'
  | 'retry_later'
  | 'validate_input_data'
  | 'unknown';

export interface PersistenceErrorInfo {
  /** Constructor / DOMException name of the original error */
  errorType: string;
  message: string;
  category: PersistenceErrorCategory;
  constraintKind?: ConstraintKind;
  retryable: boolean;
  rowIndex: number | null;
  suggestedAction: SuggestedAction;
}

/** Dexie / IndexedDB error names that mean "try again" */
const RETRYABLE_ERROR_NAMES = new Set([
  'DatabaseClosedError',
  'TimeoutError',
  'TransactionInactiveError',
  'OpenFailedError',
]);

const RETRYABLE_MESSAGE_KEYWORDS = [
  'database is locked',
  'connection',
  'timeout',
  'deadlock',
  'blocked',
];

const CONSTRAINT_ERROR_NAMES = new Set(['ConstraintError']);

// ============================================
// Helpers
// ============================================

function errorName(error: unknown): string {
  if (error instanceof Error) return error.name;
  if (typeof error === 'object' && error !== null && 'name' in error) {
    return String(error.name);
  }
  return typeof error;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * A Dexie BulkError wraps one error per failed item in `failures`.
 */
function bulkFailures(error: unknown): unknown[] {
  if (
    typeof error === 'object' &&
    error !== null &&
    'failures' in error &&
    Array.isArray(error.failures)
  ) {
    return error.failures;
  }
  return [];
}

function isStoreConstraintError(error: unknown): boolean {
  if (CONSTRAINT_ERROR_NAMES.has(errorName(error))) return true;
  if (errorName(error) === 'BulkError') {
    return bulkFailures(error).some((f) => CONSTRAINT_ERROR_NAMES.has(errorName(f)));
  }
  // Dexie wraps the DOMException under `inner`
  if (typeof error === 'object' && error !== null && 'inner' in error && error.inner) {
    return CONSTRAINT_ERROR_NAMES.has(errorName(error.inner));
  }
  return false;
}

// ============================================
// Classification
// ============================================

/**
 * Whether repeating the failed store operation may succeed.
 * Constraint and validation failures never are.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof ConnectivityError) return true;
  if (error instanceof ConstraintViolation || error instanceof SchemaViolation) return false;
  if (isStoreConstraintError(error)) return false;

  if (RETRYABLE_ERROR_NAMES.has(errorName(error))) return true;

  const message = errorMessage(error).toLowerCase();
  return RETRYABLE_MESSAGE_KEYWORDS.some((keyword) => message.includes(keyword));
}

export function classifyPersistenceError(
  error: unknown,
  rowIndex: number | null = null
): PersistenceErrorInfo {
  const base = {
    errorType: errorName(error),
    message: errorMessage(error),
  };

  if (error instanceof ConstraintViolation) {
    return {
      ...base,
      category: 'constraint_violation',
      constraintKind: error.constraintKind,
      retryable: false,
      rowIndex: error.rowIndex ?? rowIndex,
      suggestedAction: 'check_data_integrity',
    };
  }

  if (isStoreConstraintError(error)) {
    return {
      ...base,
      category: 'constraint_violation',
      constraintKind: 'unique',
      retryable: false,
      rowIndex,
      suggestedAction: 'check_data_integrity',
    };
  }

  if (isRetryableError(error)) {
    return {
      ...base,
      category: 'connectivity',
      retryable: true,
      rowIndex,
      suggestedAction: 'retry_later',
    };
  }

  if (error instanceof SchemaViolation || error instanceof TypeError || error instanceof RangeError) {
    return {
      ...base,
      category: 'data_validation',
      retryable: false,
      rowIndex: error instanceof SchemaViolation ? (error.rowIndex ?? rowIndex) : rowIndex,
      suggestedAction: 'validate_input_data',
    };
  }

  return {
    ...base,
    category: 'unknown',
    retryable: error instanceof PipelineError ? error.recoverable : false,
    rowIndex,
    suggestedAction: 'unknown',
  };
}

// ============================================
// Retry
// ============================================

export interface RetryOptions<T> {
  /** Extra attempts after the first */
  maxRetries: number;

  /** Delay before retry n is `baseDelayMs * 2^n` */
  baseDelayMs: number;

  /** Retry a thrown error (default: `isRetryableError`) */
  shouldRetryError?: (error: unknown) => boolean;

  /** Retry a returned value that reports a transient failure */
  shouldRetryResult?: (result: T) => boolean;

  onRetry?: (attempt: number, reason: unknown) => void;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `operation` with exponential backoff. The last result is returned
 * (or the last error rethrown) once attempts are exhausted.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  options: RetryOptions<T>
): Promise<T> {
  const shouldRetryError = options.shouldRetryError ?? isRetryableError;

  for (let attempt = 0; ; attempt++) {
    const canRetry = attempt < options.maxRetries;

    let result: T;
    try {
      result = await operation();
    } catch (error) {
      if (!canRetry || !shouldRetryError(error)) {
        throw error;
      }
      options.onRetry?.(attempt + 1, error);
      await sleep(options.baseDelayMs * Math.pow(2, attempt));
      continue;
    }

    if (canRetry && options.shouldRetryResult?.(result)) {
      options.onRetry?.(attempt + 1, result);
      await sleep(options.baseDelayMs * Math.pow(2, attempt));
      continue;
    }

    return result;
  }
}
