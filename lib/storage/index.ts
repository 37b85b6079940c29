/**
 * Storage Module Exports
 *
 * Re-exports the database, the transactional write path and the read-side
 * repository.
 */

// Database
export { LedgerDatabase, DEFAULT_DATABASE_NAME, type LedgerDatabaseOptions } from './db';

// Transactions
export {
  TransactionContext,
  runInTransaction,
  type TransactionState,
} from './transaction-context';

export { CategoryResolver, type ResolveOptions } from './category-resolver';

export {
  TransactionCoordinator,
  selectTier,
  TIER_LIMITS,
  type BatchTier,
  type BatchOperationResult,
  type RowFailure,
  type TransactionCoordinatorOptions,
} from './transaction-coordinator';

// Errors
export {
  classifyPersistenceError,
  isRetryableError,
  withRetry,
  type PersistenceErrorInfo,
  type RetryOptions,
} from './error-classifier';

// Read side
export {
  CategoryRepository,
  buildHierarchy,
  DEFAULT_CATEGORIES,
  type TransactionFilters,
} from './category-repository';
