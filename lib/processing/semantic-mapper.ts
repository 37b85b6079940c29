/**
 * Semantic Mapper
 *
 * Second pass. Picks the free-text description column among the columns
 * the structural pass left unclaimed. Never fatal: when the model gives no
 * usable answer the mapper falls back to header keywords, then to
 * concatenating every remaining text column.
 */

import { z } from 'zod';

import type { LLMClient } from '@/lib/ai/llm-client';
import { buildSemanticPrompt } from '@/lib/ai/prompt-builder';
import { parseJsonResponse } from '@/lib/ai/response-parser';
import { SemanticMappingFailure } from '@/lib/errors';
import type { RawFrame, SemanticMapping } from '@/types/pipeline';

import { parseAmount } from './amount-parser';
import { frameToCsv, isBlank, matchColumn, rowCount, selectColumns, selectRows } from './frame';

// ============================================
// Interface
// ============================================

export interface SemanticMapper {
  map(sample: RawFrame, consumedColumns: ReadonlySet<string>): Promise<SemanticMapping>;
}

// ============================================
// Fallbacks
// ============================================

/** Header keywords in priority order */
export const DESCRIPTION_KEYWORDS = [
  'description',
  'narrative',
  'narration',
  'details',
  'particulars',
  'memo',
  'transaction',
] as const;

export function remainingColumns(
  sample: RawFrame,
  consumedColumns: ReadonlySet<string>
): string[] {
  return sample.columns.filter((c) => !consumedColumns.has(c));
}

export function findKeywordDescriptionColumn(columns: string[]): string | null {
  for (const keyword of DESCRIPTION_KEYWORDS) {
    const match = columns.find((c) => c.toLowerCase().includes(keyword));
    if (match) return match;
  }
  return null;
}

/**
 * Columns holding at least one value that is not a number.
 */
export function findTextColumns(sample: RawFrame, columns: string[]): string[] {
  return columns.filter((column) =>
    (sample.data[column] ?? []).some((v) => !isBlank(v) && parseAmount(v) === null)
  );
}

function freezeMapping(mapping: SemanticMapping): SemanticMapping {
  return Object.freeze({ ...mapping, fallbackColumns: [...mapping.fallbackColumns] });
}

export function buildFallbackMapping(
  sample: RawFrame,
  consumedColumns: ReadonlySet<string>
): SemanticMapping {
  const remaining = remainingColumns(sample, consumedColumns);

  const keywordMatch = findKeywordDescriptionColumn(remaining);
  if (keywordMatch) {
    return freezeMapping({ descriptionColumn: keywordMatch, fallbackColumns: [], source: 'keyword' });
  }

  return freezeMapping({
    descriptionColumn: null,
    fallbackColumns: findTextColumns(sample, remaining),
    source: 'concatenation',
  });
}

// ============================================
// Keyword Mapper
// ============================================

export class KeywordSemanticMapper implements SemanticMapper {
  async map(sample: RawFrame, consumedColumns: ReadonlySet<string>): Promise<SemanticMapping> {
    return buildFallbackMapping(sample, consumedColumns);
  }
}

// ============================================
// LLM Mapper
// ============================================

const SemanticResponseSchema = z.object({
  description_column: z.string().nullable(),
});

/** Rows of the sample shown to the model */
const PROMPT_ROWS = 10;

export interface LLMSemanticMapperOptions {
  debug?: boolean;
}

export class LLMSemanticMapper implements SemanticMapper {
  private debug: boolean;

  constructor(
    private client: LLMClient,
    options: LLMSemanticMapperOptions = {}
  ) {
    this.debug = options.debug ?? false;
  }

  async map(sample: RawFrame, consumedColumns: ReadonlySet<string>): Promise<SemanticMapping> {
    try {
      const column = await this.askModel(sample, consumedColumns);
      return freezeMapping({ descriptionColumn: column, fallbackColumns: [], source: 'llm' });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      const fallback = buildFallbackMapping(sample, consumedColumns);
      console.warn(
        `[SemanticMapper] ${reason}; using ${fallback.source} fallback` +
          (fallback.descriptionColumn ? ` ("${fallback.descriptionColumn}")` : '')
      );
      return fallback;
    }
  }

  private async askModel(
    sample: RawFrame,
    consumedColumns: ReadonlySet<string>
  ): Promise<string> {
    const remaining = remainingColumns(sample, consumedColumns);
    if (remaining.length === 0) {
      throw new SemanticMappingFailure('No columns remaining for description mapping');
    }

    const head = selectRows(
      selectColumns(sample, remaining),
      Array.from({ length: Math.min(PROMPT_ROWS, rowCount(sample)) }, (_, i) => i)
    );
    const prompt = buildSemanticPrompt([...consumedColumns], remaining, frameToCsv(head));
    if (this.debug) {
      console.log('[SemanticMapper] Prompt:\n' + prompt);
    }

    let text: string;
    try {
      text = (await this.client.generate(prompt, { json: true })).text;
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new SemanticMappingFailure(`Inference call failed: ${detail}`, { cause: error });
    }

    if (this.debug) {
      console.log('[SemanticMapper] Raw response:\n' + text);
    }

    const parsed = parseJsonResponse(text, SemanticResponseSchema);
    if (!parsed.success) {
      throw new SemanticMappingFailure(parsed.error, { response: text });
    }

    const name = parsed.data.description_column ?? '';
    if (!name.trim()) {
      throw new SemanticMappingFailure('Model identified no description column');
    }
    const column = matchColumn(name, remaining);
    if (column === null) {
      throw new SemanticMappingFailure(`Model chose unavailable column "${name}"`, {
        column: name,
        remaining,
      });
    }

    return column;
  }
}
