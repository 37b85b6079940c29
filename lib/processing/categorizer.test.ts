/**
 * Unit Tests for the Categorizer
 *
 * Batch isolation, retries, defaulting, progress reporting and
 * cancellation. Backoff is disabled with retryDelayMs: 0.
 */

import { describe, it, expect, vi } from 'vitest';

import { LLMConfigError } from '@/lib/ai/llm-client';
import { ConnectivityError } from '@/lib/errors';
import {
  createMockLLMClient,
  promptRowCount,
  uniformAssignments,
} from '@/tests/factories/llm';
import { createNormalizedTransactions } from '@/tests/factories/transaction';
import type { CategoryHierarchy } from '@/types/pipeline';

import { Categorizer, CategorizationResponseSchema, partition } from './categorizer';

const hierarchy: CategoryHierarchy = {
  Shopping: ['Online Shopping'],
  'Food & Dining': ['Groceries'],
};

describe('partition', () => {
  it('should split into fixed-size batches with a short tail', () => {
    expect(partition([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });
});

describe('CategorizationResponseSchema', () => {
  it('should unwrap an object holding the array', () => {
    const parsed = CategorizationResponseSchema.parse({
      results: [{ category: 'Shopping', sub_category: null }],
    });

    expect(parsed).toEqual([{ category: 'Shopping', sub_category: '' }]);
  });

  it('should reject an empty category', () => {
    expect(
      CategorizationResponseSchema.safeParse([{ category: '  ', sub_category: '' }]).success
    ).toBe(false);
  });
});

describe('Categorizer', () => {
  it('should assign categories in input order', async () => {
    const { client } = createMockLLMClient((prompt) =>
      JSON.stringify(
        Array.from({ length: promptRowCount(prompt) }, (_, i) => ({
          category: i === 0 ? 'Food & Dining' : 'Shopping',
          sub_category: i === 0 ? 'Groceries' : '',
        }))
      )
    );
    const rows = createNormalizedTransactions(3);

    const result = await new Categorizer(client, { batchSize: 2, retryDelayMs: 0 }).categorize(
      rows,
      hierarchy
    );

    expect(result.transactions.map((t) => [t.description, t.category, t.subCategory])).toEqual([
      ['Vendor 1', 'Food & Dining', 'Groceries'],
      ['Vendor 2', 'Shopping', ''],
      ['Vendor 3', 'Food & Dining', 'Groceries'],
    ]);
    expect(result.outcomes.every((o) => o.success)).toBe(true);
  });

  it('should isolate a failing batch and default only its rows', async () => {
    let call = 0;
    const { client, generate } = createMockLLMClient((prompt) => {
      call++;
      // Calls 2 and 3 are both attempts of batch 2
      if (call === 2 || call === 3) return 'not json';
      return uniformAssignments(promptRowCount(prompt), 'Shopping', 'Online Shopping');
    });
    const rows = createNormalizedTransactions(10);
    const onProgress = vi.fn();

    const result = await new Categorizer(client, {
      batchSize: 2,
      maxRetries: 1,
      retryDelayMs: 0,
    }).categorize(rows, hierarchy, onProgress);

    expect(generate).toHaveBeenCalledTimes(6);
    expect(result.transactions).toHaveLength(10);
    expect(result.transactions.map((t) => t.category)).toEqual([
      'Shopping',
      'Shopping',
      'Uncategorized',
      'Uncategorized',
      'Shopping',
      'Shopping',
      'Shopping',
      'Shopping',
      'Shopping',
      'Shopping',
    ]);
    expect(result.transactions[2]?.subCategory).toBe('');
    expect(result.defaultedRows).toBe(2);
    expect(result.outcomes[1]).toEqual({
      batchIndex: 1,
      success: false,
      rowsAffected: 0,
      errorKind: 'inference_failed',
      failedRowIndices: [2, 3],
    });
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0]?.attempts).toBe(2);

    expect(onProgress).toHaveBeenCalledTimes(5);
    expect(onProgress).toHaveBeenNthCalledWith(1, 0.2, 'batch 1 ok');
    expect(onProgress).toHaveBeenNthCalledWith(2, 0.4, 'batch 2 failed, rows defaulted');
    expect(onProgress).toHaveBeenNthCalledWith(5, 1, 'batch 5 ok');
  });

  it('should default rows after two timeouts', async () => {
    const { client, generate } = createMockLLMClient(() => {
      throw new ConnectivityError('Inference request timed out after 10ms', 'inference', 'timeout');
    });

    const result = await new Categorizer(client, { maxRetries: 1, retryDelayMs: 0 }).categorize(
      createNormalizedTransactions(1),
      hierarchy
    );

    expect(generate).toHaveBeenCalledTimes(2);
    expect(result.transactions[0]).toMatchObject({ category: 'Uncategorized', subCategory: '' });
    expect(result.outcomes[0]?.errorKind).toBe('connectivity');
  });

  it('should not retry configuration errors', async () => {
    const { client, generate } = createMockLLMClient(() => {
      throw new LLMConfigError('Invalid API key');
    });

    const result = await new Categorizer(client, { maxRetries: 3, retryDelayMs: 0 }).categorize(
      createNormalizedTransactions(1),
      hierarchy
    );

    expect(generate).toHaveBeenCalledTimes(1);
    expect(result.failures[0]?.attempts).toBe(1);
  });

  it('should reject a response with the wrong row count', async () => {
    const { client } = createMockLLMClient(() => uniformAssignments(1, 'Shopping', ''));

    const result = await new Categorizer(client, { maxRetries: 0, retryDelayMs: 0 }).categorize(
      createNormalizedTransactions(2),
      hierarchy
    );

    expect(result.defaultedRows).toBe(2);
    expect(result.failures[0]?.message).toContain('Expected 2 assignments, received 1');
  });

  it('should stop sending batches when progress returns false', async () => {
    const { client, generate } = createMockLLMClient((prompt) =>
      uniformAssignments(promptRowCount(prompt), 'Shopping', '')
    );
    const onProgress = vi.fn().mockReturnValue(false);

    const result = await new Categorizer(client, { batchSize: 2, retryDelayMs: 0 }).categorize(
      createNormalizedTransactions(6),
      hierarchy,
      onProgress
    );

    expect(generate).toHaveBeenCalledTimes(1);
    expect(result.cancelled).toBe(true);
    expect(result.transactions).toHaveLength(6);
    expect(result.transactions.map((t) => t.category)).toEqual([
      'Shopping',
      'Shopping',
      'Uncategorized',
      'Uncategorized',
      'Uncategorized',
      'Uncategorized',
    ]);
    expect(result.outcomes.map((o) => o.errorKind)).toEqual([undefined, 'cancelled', 'cancelled']);
  });

  it('should map progress onto the given range', async () => {
    const { client } = createMockLLMClient((prompt) =>
      uniformAssignments(promptRowCount(prompt), 'Shopping', '')
    );
    const onProgress = vi.fn();

    await new Categorizer(client, { batchSize: 1, retryDelayMs: 0 }).categorize(
      createNormalizedTransactions(2),
      hierarchy,
      onProgress,
      { start: 0.5, end: 1 }
    );

    expect(onProgress.mock.calls.map((c) => c[0])).toEqual([0.75, 1]);
  });
});
