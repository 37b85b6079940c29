/**
 * Import Service
 *
 * Entry point for importing one parsed statement: runs the guarded
 * processor, persists its rows through the transaction coordinator and
 * folds everything that went wrong along the way into an ImportSummary.
 *
 * Fatal errors (structural discovery, schema violations, empty input) are
 * logged with their stage and rethrown. Everything else is reported in
 * the summary.
 */

import type { LLMClient } from '@/lib/ai/llm-client';
import { resolvePipelineConfig, type PipelineConfigInput } from '@/lib/config';
import { handleError } from '@/lib/errors';
import {
  createAIProcessor,
  createRuleBasedProcessor,
  type ProcessingReport,
  type ProcessorResult,
  type TransactionProcessor,
} from '@/lib/processing/processor';
import { CategoryRepository } from '@/lib/storage/category-repository';
import type { LedgerDatabase } from '@/lib/storage/db';
import { withRetry } from '@/lib/storage/error-classifier';
import {
  TransactionCoordinator,
  type BatchOperationResult,
} from '@/lib/storage/transaction-coordinator';
import type { FinalTransaction, ProgressCallback, RawFrame } from '@/types/pipeline';

// ============================================
// Types
// ============================================

export interface ImportSummary {
  /** Rows in the input frame */
  inputRows: number;

  /** Rows that survived extraction */
  extractedRows: number;

  /** Rows dropped during extraction */
  droppedRows: number;

  /** Rows persisted with the default category after a failed batch */
  defaultedRows: number;

  persistedRows: number;

  /** Extracted rows that were not persisted */
  failedRows: number;

  /** The progress callback stopped categorization early */
  cancelled: boolean;

  report: ProcessingReport;
  persistence: BatchOperationResult;
}

export interface ImportOptions {
  onProgress?: ProgressCallback | null;
}

export interface SaveRetryOptions {
  /** Extra save attempts after a retryable failure (default 2) */
  maxRetries?: number;

  /** Base backoff delay in ms (default 200) */
  baseDelayMs?: number;
}

export interface ImportServiceDeps {
  processor: TransactionProcessor<FinalTransaction>;
  coordinator: TransactionCoordinator;
  /** Hierarchy cache to reset at the start of each import */
  repository?: CategoryRepository;
  retry?: SaveRetryOptions;
}

/**
 * One-line summary: "N of M rows processed, K defaulted, J dropped".
 */
export function describeImportSummary(summary: ImportSummary): string {
  return (
    `${summary.persistedRows} of ${summary.inputRows} rows processed, ` +
    `${summary.defaultedRows} defaulted, ${summary.droppedRows} dropped`
  );
}

// ============================================
// Service
// ============================================

export class ImportService {
  private processor: TransactionProcessor<FinalTransaction>;
  private coordinator: TransactionCoordinator;
  private repository?: CategoryRepository;
  private maxRetries: number;
  private baseDelayMs: number;

  constructor(deps: ImportServiceDeps) {
    this.processor = deps.processor;
    this.coordinator = deps.coordinator;
    this.repository = deps.repository;
    this.maxRetries = deps.retry?.maxRetries ?? 2;
    this.baseDelayMs = deps.retry?.baseDelayMs ?? 200;
  }

  async importFrame(raw: RawFrame, options: ImportOptions = {}): Promise<ImportSummary> {
    this.repository?.beginRun();

    let processed: ProcessorResult<FinalTransaction>;
    try {
      processed = await this.processor.process(raw, options.onProgress ?? null);
    } catch (error) {
      console.error('[ImportService] Import failed:', handleError(error));
      throw error;
    }

    const { rows, report } = processed;

    // Only a save that wrote nothing is repeated; partial large-tier
    // results are returned as they are.
    const persistence = await withRetry(() => this.coordinator.saveBatch(rows), {
      maxRetries: this.maxRetries,
      baseDelayMs: this.baseDelayMs,
      shouldRetryResult: (result) =>
        !result.success && result.rowsPersisted === 0 && result.error?.retryable === true,
      onRetry: (attempt) =>
        console.warn(`[ImportService] Save failed with a retryable error, retry ${attempt}`),
    });

    const summary: ImportSummary = {
      inputRows: report.inputRows,
      extractedRows: report.extractedRows,
      droppedRows: report.droppedRows.length,
      defaultedRows: report.defaultedRows,
      persistedRows: persistence.rowsPersisted,
      failedRows: persistence.rowsRequested - persistence.rowsPersisted,
      cancelled: report.cancelled,
      report,
      persistence,
    };

    console.log(`[ImportService] ${describeImportSummary(summary)}`);

    return summary;
  }
}

// ============================================
// Factory
// ============================================

export interface CreateImportServiceOptions {
  db: LedgerDatabase;
  /** Inference client; without one the rule-based processor is used */
  client?: LLMClient;
  config?: PipelineConfigInput;
  retry?: SaveRetryOptions;
}

/**
 * Wire repository, coordinator and processor around one database.
 */
export function createImportService(options: CreateImportServiceOptions): ImportService {
  const config = resolvePipelineConfig(options.config);

  const repository = new CategoryRepository(options.db, {
    cachePolicy: config.hierarchyCachePolicy,
  });

  const coordinator = new TransactionCoordinator(options.db, {
    onCategoriesCreated: () => repository.invalidate(),
  });

  const processor = options.client
    ? createAIProcessor({
        client: options.client,
        hierarchySource: repository,
        config: options.config,
      })
    : createRuleBasedProcessor({ config: options.config });

  return new ImportService({
    processor,
    coordinator,
    repository,
    retry: options.retry ?? {
      maxRetries: config.maxRetries,
      baseDelayMs: config.retryDelayMs,
    },
  });
}
