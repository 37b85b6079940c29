/**
 * Categorizer
 *
 * Third pass. Sends extracted rows to the inference service in fixed-size
 * batches, with the category hierarchy as context, and attaches one
 * category/sub-category pair to every row.
 *
 * Batches run one after another and are isolated: a batch that exhausts
 * its attempts is emitted with the "Uncategorized" default and the loop
 * moves on. Output order always equals input order.
 */

import { z } from 'zod';

import type { LLMClient } from '@/lib/ai/llm-client';
import { buildCategorizationPrompt } from '@/lib/ai/prompt-builder';
import { parseJsonResponse } from '@/lib/ai/response-parser';
import {
  CategorizationBatchFailure,
  ConnectivityError,
  PipelineError,
} from '@/lib/errors';
import {
  UNCATEGORIZED,
  type BatchOutcome,
  type CategorizedTransaction,
  type CategoryHierarchy,
  type NormalizedTransaction,
  type ProgressCallback,
} from '@/types/pipeline';

// ============================================
// Types
// ============================================

export interface CategorizerOptions {
  /** Rows per request (default 25) */
  batchSize?: number;

  /** Extra attempts per batch after the first (default 1) */
  maxRetries?: number;

  /** Base delay for exponential backoff between attempts (default 500ms) */
  retryDelayMs?: number;

  /** Log prompts and raw model output */
  debug?: boolean;
}

/**
 * Fraction range the categorizer reports progress in, so a caller can map
 * it onto a larger pipeline.
 */
export interface ProgressRange {
  start: number;
  end: number;
}

export interface CategorizationResult {
  transactions: CategorizedTransaction[];
  outcomes: BatchOutcome[];
  failures: CategorizationBatchFailure[];

  /** Rows emitted with the default category */
  defaultedRows: number;

  /** True when the progress callback asked to stop */
  cancelled: boolean;
}

// ============================================
// Response Schema
// ============================================

const CategoryAssignmentSchema = z.object({
  category: z.string().trim().min(1),
  sub_category: z
    .string()
    .nullish()
    .transform((value) => value?.trim() ?? ''),
});

/**
 * A JSON array of assignments. Some models wrap the array in an object
 * (`{"results": [...]}`); the first array-valued property is unwrapped.
 */
export const CategorizationResponseSchema = z.preprocess((value) => {
  if (value && typeof value === 'object' && !Array.isArray(value)) {
    const firstArray = Object.values(value).find((v) => Array.isArray(v));
    return firstArray ?? value;
  }
  return value;
}, z.array(CategoryAssignmentSchema));

export type CategoryAssignment = z.infer<typeof CategoryAssignmentSchema>;

// ============================================
// Helpers
// ============================================

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function withDefaultCategory(row: NormalizedTransaction): CategorizedTransaction {
  return { ...row, category: UNCATEGORIZED, subCategory: '' };
}

export function partition<T>(items: T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

// ============================================
// Categorizer
// ============================================

export class Categorizer {
  private batchSize: number;
  private maxRetries: number;
  private retryDelayMs: number;
  private debug: boolean;

  constructor(
    private client: LLMClient,
    options: CategorizerOptions = {}
  ) {
    this.batchSize = Math.max(1, options.batchSize ?? 25);
    this.maxRetries = Math.max(0, options.maxRetries ?? 1);
    this.retryDelayMs = options.retryDelayMs ?? 500;
    this.debug = options.debug ?? false;
  }

  async categorize(
    rows: NormalizedTransaction[],
    hierarchy: CategoryHierarchy,
    onProgress?: ProgressCallback | null,
    range: ProgressRange = { start: 0, end: 1 }
  ): Promise<CategorizationResult> {
    const result: CategorizationResult = {
      transactions: [],
      outcomes: [],
      failures: [],
      defaultedRows: 0,
      cancelled: false,
    };

    const batches = partition(rows, this.batchSize);
    let offset = 0;

    for (let i = 0; i < batches.length; i++) {
      const batch = batches[i] ?? [];
      const indices = batch.map((_, j) => offset + j);
      offset += batch.length;

      if (result.cancelled) {
        result.transactions.push(...batch.map(withDefaultCategory));
        result.defaultedRows += batch.length;
        result.outcomes.push({
          batchIndex: i,
          success: false,
          rowsAffected: 0,
          errorKind: 'cancelled',
          failedRowIndices: indices,
        });
        continue;
      }

      let message: string;
      try {
        const assignments = await this.categorizeBatch(batch, hierarchy, i);
        result.transactions.push(
          ...batch.map((row, j) => ({
            ...row,
            category: assignments[j]?.category ?? UNCATEGORIZED,
            subCategory: assignments[j]?.sub_category ?? '',
          }))
        );
        result.outcomes.push({ batchIndex: i, success: true, rowsAffected: batch.length });
        message = `batch ${i + 1} ok`;
      } catch (error) {
        if (!(error instanceof CategorizationBatchFailure)) throw error;

        console.warn(`[Categorizer] ${error.message}; ${batch.length} rows defaulted`);
        result.failures.push(error);
        result.transactions.push(...batch.map(withDefaultCategory));
        result.defaultedRows += batch.length;
        result.outcomes.push({
          batchIndex: i,
          success: false,
          rowsAffected: 0,
          errorKind: error.cause instanceof ConnectivityError ? 'connectivity' : 'inference_failed',
          failedRowIndices: indices,
        });
        message = `batch ${i + 1} failed, rows defaulted`;
      }

      const fraction = range.start + ((i + 1) / batches.length) * (range.end - range.start);
      if (onProgress?.(fraction, message) === false && i < batches.length - 1) {
        console.log(`[Categorizer] Cancelled after batch ${i + 1}/${batches.length}`);
        result.cancelled = true;
      }
    }

    return result;
  }

  /**
   * Categorize one batch, retrying up to `maxRetries` times.
   * Throws CategorizationBatchFailure once attempts are exhausted.
   */
  private async categorizeBatch(
    batch: NormalizedTransaction[],
    hierarchy: CategoryHierarchy,
    batchIndex: number
  ): Promise<CategoryAssignment[]> {
    const prompt = buildCategorizationPrompt(batch, hierarchy);
    if (this.debug) {
      console.log(`[Categorizer] Batch ${batchIndex + 1} prompt:\n${prompt}`);
    }

    let lastError: unknown = null;
    let attempts = 0;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      attempts = attempt + 1;
      try {
        return await this.requestAssignments(prompt, batch.length, batchIndex);
      } catch (error) {
        lastError = error;
        console.warn(
          `[Categorizer] Batch ${batchIndex + 1}, attempt ${attempts}/${this.maxRetries + 1} failed:`,
          error instanceof Error ? error.message : error
        );

        // Configuration errors will not go away on retry
        if (error instanceof PipelineError && !error.recoverable) {
          break;
        }

        if (attempt < this.maxRetries && this.retryDelayMs > 0) {
          await sleep(this.retryDelayMs * Math.pow(2, attempt));
        }
      }
    }

    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    throw new CategorizationBatchFailure(
      `Batch ${batchIndex + 1} failed after ${attempts} attempt(s): ${reason}`,
      batchIndex,
      attempts,
      lastError
    );
  }

  private async requestAssignments(
    prompt: string,
    expected: number,
    batchIndex: number
  ): Promise<CategoryAssignment[]> {
    const response = await this.client.generate(prompt, { json: true });

    if (this.debug) {
      console.log(`[Categorizer] Batch ${batchIndex + 1} raw response:\n${response.text}`);
    }

    const parsed = parseJsonResponse(response.text, CategorizationResponseSchema);
    if (!parsed.success) {
      throw new Error(parsed.error);
    }
    if (parsed.data.length !== expected) {
      throw new Error(`Expected ${expected} assignments, received ${parsed.data.length}`);
    }

    return parsed.data;
  }
}
