/**
 * Transaction Coordinator
 *
 * Persists a guarded table of transactions. The batch size picks the tier:
 *
 * - small  (< 100 rows):    one transaction, the first bad row aborts it
 * - medium (100–1000 rows): one transaction, every bad row is recorded
 *                           before the whole batch is rolled back
 * - large  (> 1000 rows):   independent 500-row chunks; a failed chunk is
 *                           rolled back alone and later chunks still run
 *
 * The coordinator never retries. Failures come back classified in the
 * result so the caller can decide.
 */

import { v4 as uuidv4 } from 'uuid';

import { ConstraintViolation } from '@/lib/errors';
import { isIsoCalendarDate } from '@/lib/processing/date-format';
import {
  createImportId,
  createTransactionId,
  type Category,
  type ImportId,
  type StoredTransaction,
} from '@/types/database';
import type { BatchErrorKind, BatchOutcome, FinalTable, FinalTransaction } from '@/types/pipeline';

import { CategoryResolver } from './category-resolver';
import type { LedgerDatabase } from './db';
import { classifyPersistenceError, type PersistenceErrorInfo } from './error-classifier';
import { runInTransaction, type TransactionContext } from './transaction-context';

// ============================================
// Types
// ============================================

export type BatchTier = 'small' | 'medium' | 'large';

export const TIER_LIMITS = {
  /** Batches below this many rows are small */
  mediumFrom: 100,
  /** Batches above this many rows are large */
  largeAbove: 1000,
  /** Rows per sub-transaction in the large tier */
  chunkSize: 500,
} as const;

export interface RowFailure {
  /** Index into the table passed to saveBatch */
  rowIndex: number;
  constraintKind: ConstraintViolation['constraintKind'];
  column: string | null;
  message: string;
}

export interface BatchOperationResult {
  success: boolean;
  tier: BatchTier;
  importId: ImportId;
  rowsRequested: number;
  rowsPersisted: number;
  categoriesCreated: number;
  /** One entry per transaction that was run */
  chunks: BatchOutcome[];
  failedRows: RowFailure[];
  /** Indices into `chunks` of rolled-back chunks */
  failedChunks: number[];
  /** Classified cause of the (last) failure */
  error?: PersistenceErrorInfo;
}

export interface TransactionCoordinatorOptions {
  resolver?: CategoryResolver;
  /** Called after a commit that created categories */
  onCategoriesCreated?: (categories: readonly Category[]) => void;
}

export function selectTier(rowCount: number): BatchTier {
  if (rowCount < TIER_LIMITS.mediumFrom) return 'small';
  if (rowCount <= TIER_LIMITS.largeAbove) return 'medium';
  return 'large';
}

/**
 * Thrown inside a medium/large transaction to roll it back after all
 * offending rows were recorded.
 */
class RowFailuresRollback extends ConstraintViolation {
  constructor(public failures: RowFailure[]) {
    const first = failures[0];
    super(
      `${failures.length} row(s) violated store constraints`,
      first?.constraintKind ?? 'not_null',
      first?.rowIndex ?? null,
      first?.column ?? null
    );
    this.name = 'RowFailuresRollback';
  }
}

function toRowFailure(violation: ConstraintViolation, rowIndex: number): RowFailure {
  return {
    rowIndex: violation.rowIndex ?? rowIndex,
    constraintKind: violation.constraintKind,
    column: violation.column,
    message: violation.message,
  };
}

function errorKindOf(info: PersistenceErrorInfo): BatchErrorKind {
  switch (info.category) {
    case 'constraint_violation':
      return 'constraint_violation';
    case 'connectivity':
      return 'connectivity';
    default:
      return 'unknown';
  }
}

// ============================================
// Coordinator
// ============================================

export class TransactionCoordinator {
  private resolver: CategoryResolver;
  private onCategoriesCreated?: (categories: readonly Category[]) => void;

  constructor(
    private db: LedgerDatabase,
    options: TransactionCoordinatorOptions = {}
  ) {
    this.resolver = options.resolver ?? new CategoryResolver();
    this.onCategoriesCreated = options.onCategoriesCreated;
  }

  async saveBatch(rows: FinalTable): Promise<BatchOperationResult> {
    const tier = selectTier(rows.length);
    const result: BatchOperationResult = {
      success: true,
      tier,
      importId: createImportId(uuidv4()),
      rowsRequested: rows.length,
      rowsPersisted: 0,
      categoriesCreated: 0,
      chunks: [],
      failedRows: [],
      failedChunks: [],
    };

    if (rows.length === 0) {
      return result;
    }

    console.log(
      `[TransactionCoordinator] Saving ${rows.length} rows (${tier} tier, import ${result.importId})`
    );

    if (tier === 'large') {
      for (let start = 0; start < rows.length; start += TIER_LIMITS.chunkSize) {
        await this.runChunk(rows, start, Math.min(start + TIER_LIMITS.chunkSize, rows.length), result);
      }
    } else {
      await this.runChunk(rows, 0, rows.length, result);
    }

    result.success = result.failedRows.length === 0 && result.failedChunks.length === 0;

    if (result.success) {
      console.log(`[TransactionCoordinator] Saved ${result.rowsPersisted} rows`);
    } else {
      console.warn(
        `[TransactionCoordinator] Saved ${result.rowsPersisted} of ${rows.length} rows; ` +
          `${result.failedRows.length} failed row(s), ${result.failedChunks.length} failed chunk(s)`
      );
    }

    return result;
  }

  // ============================================
  // Chunks
  // ============================================

  private async runChunk(
    rows: FinalTable,
    start: number,
    end: number,
    result: BatchOperationResult
  ): Promise<void> {
    const chunkIndex = result.chunks.length;
    const stopAtFirst = result.tier === 'small';

    try {
      const outcome = await runInTransaction(this.db, async (ctx) => {
        const failures: RowFailure[] = [];

        for (let i = start; i < end; i++) {
          const row = rows[i];
          if (!row) continue;

          try {
            await this.writeRow(row, i, ctx, result.importId);
          } catch (error) {
            if (stopAtFirst || !(error instanceof ConstraintViolation)) {
              throw error;
            }
            failures.push(toRowFailure(error, i));
          }
        }

        if (failures.length > 0) {
          throw new RowFailuresRollback(failures);
        }

        return end - start;
      });

      result.rowsPersisted += outcome.value;
      result.categoriesCreated += outcome.context.createdCategories.length;
      result.chunks.push({ batchIndex: chunkIndex, success: true, rowsAffected: outcome.value });

      if (outcome.context.createdCategories.length > 0) {
        this.onCategoriesCreated?.(outcome.context.createdCategories);
      }
    } catch (error) {
      const info = classifyPersistenceError(error);
      const failures =
        error instanceof RowFailuresRollback
          ? error.failures
          : error instanceof ConstraintViolation
            ? [toRowFailure(error, error.rowIndex ?? start)]
            : [];

      result.failedRows.push(...failures);
      result.failedChunks.push(chunkIndex);
      result.error = info;
      result.chunks.push({
        batchIndex: chunkIndex,
        success: false,
        rowsAffected: 0,
        errorKind: errorKindOf(info),
        failedRowIndices: failures.map((f) => f.rowIndex),
      });

      console.warn(
        `[TransactionCoordinator] Rolled back rows ${start}-${end - 1}: ${info.message}`
      );
    }
  }

  // ============================================
  // Rows
  // ============================================

  private async writeRow(
    row: FinalTransaction,
    rowIndex: number,
    ctx: TransactionContext,
    importId: ImportId
  ): Promise<void> {
    if (!Number.isFinite(row.amount)) {
      throw new ConstraintViolation('amount must be a finite number', 'not_null', rowIndex, 'amount');
    }
    if (!isIsoCalendarDate(row.transactionDate)) {
      throw new ConstraintViolation(
        `transactionDate "${row.transactionDate}" is not a calendar date`,
        'not_null',
        rowIndex,
        'transactionDate'
      );
    }
    if (!row.category.trim()) {
      throw new ConstraintViolation('category must not be empty', 'not_null', rowIndex, 'category');
    }

    const categoryId = await this.resolver.resolveOrCreate(row.category, row.subCategory, ctx);

    const category = await ctx.categories.get(categoryId);
    if (!category) {
      throw new ConstraintViolation(
        `category ${categoryId} does not exist`,
        'foreign_key',
        rowIndex,
        'categoryId'
      );
    }

    const stored: StoredTransaction = {
      id: createTransactionId(uuidv4()),
      description: row.description,
      transactionDate: row.transactionDate,
      amount: row.amount,
      categoryId,
      importId,
      createdAt: new Date(),
    };

    try {
      await ctx.transactions.add(stored);
    } catch (error) {
      const info = classifyPersistenceError(error, rowIndex);
      if (info.category === 'constraint_violation') {
        throw new ConstraintViolation(info.message, info.constraintKind ?? 'unique', rowIndex, 'id');
      }
      throw error;
    }
  }
}
