/**
 * Unit Tests for the Semantic Mapper
 */

import { describe, it, expect } from 'vitest';

import { createMockLLMClient } from '@/tests/factories/llm';

import { frameFromRows } from './frame';
import {
  buildFallbackMapping,
  findKeywordDescriptionColumn,
  KeywordSemanticMapper,
  LLMSemanticMapper,
} from './semantic-mapper';

const sample = frameFromRows(['Date', 'Ref', 'Payee', 'Amount'], [
  { Date: '2024-01-01', Ref: '1001', Payee: 'Corner Bakery', Amount: '-5.00' },
  { Date: '2024-01-02', Ref: '1002', Payee: 'Book Shop', Amount: '-12.00' },
]);
const consumed = new Set(['Date', 'Amount']);

describe('findKeywordDescriptionColumn', () => {
  it('should follow keyword priority', () => {
    expect(findKeywordDescriptionColumn(['Transaction ID', 'Narration'])).toBe('Narration');
  });

  it('should return null when no header matches', () => {
    expect(findKeywordDescriptionColumn(['Ref', 'Payee'])).toBeNull();
  });
});

describe('buildFallbackMapping', () => {
  it('should concatenate text columns when no keyword matches', () => {
    expect(buildFallbackMapping(sample, consumed)).toEqual({
      descriptionColumn: null,
      fallbackColumns: ['Payee'],
      source: 'concatenation',
    });
  });

  it('should prefer a keyword column', async () => {
    const withMemo = frameFromRows(['Date', 'Memo', 'Amount'], [
      { Date: '2024-01-01', Memo: 'Fuel', Amount: '-5.00' },
    ]);

    await expect(new KeywordSemanticMapper().map(withMemo, consumed)).resolves.toEqual({
      descriptionColumn: 'Memo',
      fallbackColumns: [],
      source: 'keyword',
    });
  });
});

describe('LLMSemanticMapper', () => {
  it('should use the column the model picks', async () => {
    const { client } = createMockLLMClient(() => '{"description_column": "Payee"}');

    const mapping = await new LLMSemanticMapper(client).map(sample, consumed);

    expect(mapping).toEqual({ descriptionColumn: 'Payee', fallbackColumns: [], source: 'llm' });
  });

  it('should map a trimmed pick onto a padded header', async () => {
    const padded = frameFromRows(['Date', 'Payee ', 'Amount'], [
      { Date: '2024-01-01', 'Payee ': 'Corner Bakery', Amount: '-5.00' },
    ]);
    const { client } = createMockLLMClient(() => '{"description_column": "Payee"}');

    const mapping = await new LLMSemanticMapper(client).map(padded, consumed);

    expect(mapping).toEqual({ descriptionColumn: 'Payee ', fallbackColumns: [], source: 'llm' });
  });

  it('should send only the remaining columns', async () => {
    const { client, generate } = createMockLLMClient(() => '{"description_column": "Payee"}');

    await new LLMSemanticMapper(client).map(sample, consumed);

    const prompt = generate.mock.calls[0]?.[0] ?? '';
    expect(prompt).toContain('Choose ONE of the remaining columns: ["Ref","Payee"]');
    expect(prompt).toContain('Ref,Payee\n1001,Corner Bakery');
  });

  it('should fall back when the model picks a consumed column', async () => {
    const { client } = createMockLLMClient(() => '{"description_column": "Amount"}');

    const mapping = await new LLMSemanticMapper(client).map(sample, consumed);

    expect(mapping.source).toBe('concatenation');
    expect(mapping.fallbackColumns).toEqual(['Payee']);
  });

  it('should fall back when the model answers null', async () => {
    const { client } = createMockLLMClient(() => '{"description_column": null}');

    const mapping = await new LLMSemanticMapper(client).map(sample, consumed);

    expect(mapping.descriptionColumn).toBeNull();
  });

  it('should fall back when inference fails', async () => {
    const { client } = createMockLLMClient(() => {
      throw new Error('connection reset');
    });

    const mapping = await new LLMSemanticMapper(client).map(sample, consumed);

    expect(mapping.source).toBe('concatenation');
  });
});
