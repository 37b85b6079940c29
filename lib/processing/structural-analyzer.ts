/**
 * Structural Analyzer
 *
 * First pass of the pipeline. Finds the date column and its format and
 * decides how signed amounts are encoded. Everything downstream depends
 * on this result, so any failure here is fatal.
 *
 * Two implementations share the StructuralAnalyzer interface:
 * - LLMStructuralAnalyzer asks the inference service once
 * - HeuristicStructuralAnalyzer uses header keywords and value sniffing
 */

import { z } from 'zod';

import type { LLMClient } from '@/lib/ai/llm-client';
import { buildStructuralPrompt } from '@/lib/ai/prompt-builder';
import { parseJsonResponse } from '@/lib/ai/response-parser';
import { StructuralDiscoveryFailure } from '@/lib/errors';
import type {
  AmountInfo,
  RawFrame,
  StructuralInfo,
} from '@/types/pipeline';

import { parseAmount } from './amount-parser';
import { parseDateWithFormat } from './date-format';
import { frameToCsv, isBlank, matchColumn } from './frame';

// ============================================
// Interface
// ============================================

export interface StructuralAnalyzer {
  analyze(sample: RawFrame): Promise<StructuralInfo>;
}

// ============================================
// Response Schema
// ============================================

const optionalName = z.string().nullish();

export const StructuralResponseSchema = z.object({
  date_info: z.object({
    column_name: z.string().min(1),
    format_string: z.string().min(1),
  }),
  amount_info: z.object({
    representation: z.enum([
      'dual_column_debit_credit',
      'single_column_signed',
      'single_column_with_type',
    ]),
    debit_column: optionalName,
    credit_column: optionalName,
    amount_column: optionalName,
    type_column: optionalName,
    debit_identifier: optionalName,
    credit_identifier: optionalName,
  }),
});

export type StructuralResponse = z.infer<typeof StructuralResponseSchema>;

// ============================================
// Validation
// ============================================

function requireField(value: string | null | undefined, field: string): string {
  const trimmed = value?.trim() ?? '';
  if (!trimmed) {
    throw new StructuralDiscoveryFailure(`Missing required field "${field}"`, { field });
  }
  return trimmed;
}

function requireColumn(
  value: string | null | undefined,
  field: string,
  sample: RawFrame
): string {
  requireField(value, field);
  const name = value ?? '';
  const column = matchColumn(name, sample.columns);
  if (column === null) {
    throw new StructuralDiscoveryFailure(
      `Column "${name}" named by "${field}" does not exist`,
      { field, column: name, columns: sample.columns }
    );
  }
  return column;
}

/**
 * Convert the wire response into StructuralInfo, checking that exactly
 * the fields of the chosen variant are present and name real columns.
 */
export function toStructuralInfo(
  response: StructuralResponse,
  sample: RawFrame
): StructuralInfo {
  const dateColumn = requireColumn(response.date_info.column_name, 'date_info.column_name', sample);
  const dateFormat = requireField(response.date_info.format_string, 'date_info.format_string');

  const a = response.amount_info;
  let amount: AmountInfo;

  switch (a.representation) {
    case 'dual_column_debit_credit': {
      const debitColumn = requireColumn(a.debit_column, 'amount_info.debit_column', sample);
      const creditColumn = requireColumn(a.credit_column, 'amount_info.credit_column', sample);
      if (debitColumn === creditColumn) {
        throw new StructuralDiscoveryFailure('Debit and credit columns must differ', {
          column: debitColumn,
        });
      }
      amount = { representation: a.representation, debitColumn, creditColumn };
      break;
    }
    case 'single_column_signed':
      amount = {
        representation: a.representation,
        amountColumn: requireColumn(a.amount_column, 'amount_info.amount_column', sample),
      };
      break;
    case 'single_column_with_type':
      amount = {
        representation: a.representation,
        amountColumn: requireColumn(a.amount_column, 'amount_info.amount_column', sample),
        typeColumn: requireColumn(a.type_column, 'amount_info.type_column', sample),
        debitIdentifier: requireField(a.debit_identifier, 'amount_info.debit_identifier'),
        creditIdentifier: requireField(a.credit_identifier, 'amount_info.credit_identifier'),
      };
      break;
  }

  return freezeStructuralInfo({ dateColumn, dateFormat, amount });
}

/**
 * At least one non-blank sample value must parse under the format.
 */
export function assertDateFormatMatchesSample(info: StructuralInfo, sample: RawFrame): void {
  const values = (sample.data[info.dateColumn] ?? []).filter((v) => !isBlank(v));
  const parsed = values.filter((v) => parseDateWithFormat(v, info.dateFormat) !== null);

  if (parsed.length === 0) {
    throw new StructuralDiscoveryFailure(
      `No value in "${info.dateColumn}" matches date format "${info.dateFormat}"`,
      { dateColumn: info.dateColumn, dateFormat: info.dateFormat, checked: values.length }
    );
  }
}

export function freezeStructuralInfo(info: StructuralInfo): StructuralInfo {
  return Object.freeze({ ...info, amount: Object.freeze({ ...info.amount }) });
}

/**
 * Columns claimed by the structural pass.
 */
export function getConsumedColumns(info: StructuralInfo): Set<string> {
  const used = new Set<string>([info.dateColumn]);
  const { amount } = info;

  switch (amount.representation) {
    case 'dual_column_debit_credit':
      used.add(amount.debitColumn);
      used.add(amount.creditColumn);
      break;
    case 'single_column_signed':
      used.add(amount.amountColumn);
      break;
    case 'single_column_with_type':
      used.add(amount.amountColumn);
      used.add(amount.typeColumn);
      break;
  }

  return used;
}

// ============================================
// LLM Analyzer
// ============================================

export interface LLMStructuralAnalyzerOptions {
  debug?: boolean;
}

export class LLMStructuralAnalyzer implements StructuralAnalyzer {
  private debug: boolean;

  constructor(
    private client: LLMClient,
    options: LLMStructuralAnalyzerOptions = {}
  ) {
    this.debug = options.debug ?? false;
  }

  async analyze(sample: RawFrame): Promise<StructuralInfo> {
    if (sample.columns.length === 0) {
      throw new StructuralDiscoveryFailure('Sample has no columns');
    }

    const prompt = buildStructuralPrompt(sample.columns, frameToCsv(sample));
    if (this.debug) {
      console.log('[StructuralAnalyzer] Prompt:\n' + prompt);
    }

    let text: string;
    try {
      const response = await this.client.generate(prompt, { json: true });
      text = response.text;
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new StructuralDiscoveryFailure(`Inference call failed: ${detail}`, {
        cause: error,
      });
    }

    if (this.debug) {
      console.log('[StructuralAnalyzer] Raw response:\n' + text);
    }

    const parsed = parseJsonResponse(text, StructuralResponseSchema);
    if (!parsed.success) {
      throw new StructuralDiscoveryFailure(
        `Could not read structural analysis response: ${parsed.error}`,
        { response: text }
      );
    }

    const info = toStructuralInfo(parsed.data, sample);
    assertDateFormatMatchesSample(info, sample);

    console.log(
      `[StructuralAnalyzer] date=${info.dateColumn} (${info.dateFormat}), amount=${info.amount.representation}`
    );
    return info;
  }
}

// ============================================
// Heuristic Analyzer
// ============================================

/** Candidate formats, tried in order; ties go to the earlier entry */
export const CANDIDATE_DATE_FORMATS = [
  '%Y-%m-%d',
  '%d/%m/%Y',
  '%m/%d/%Y',
  '%d-%m-%Y',
  '%m-%d-%Y',
  '%d.%m.%Y',
  '%Y/%m/%d',
  '%d %b %Y',
  '%d-%b-%Y',
  '%b %d, %Y',
  '%d/%m/%y',
  '%m/%d/%y',
  '%d-%b-%y',
] as const;

const DATE_HEADERS = ['date', 'transaction date', 'trans date', 'txn date', 'posting date', 'value date'];
const AMOUNT_HEADERS = ['amount', 'transaction amount', 'txn amount', 'value', 'amt'];
const TYPE_HEADERS = ['type', 'transaction type', 'txn type', 'dr/cr', 'cr/dr', 'debit/credit', 'dr cr'];
const DEBIT_KEYWORDS = ['debit', 'withdrawal', 'withdrawals', 'dr'];
const CREDIT_KEYWORDS = ['credit', 'deposit', 'deposits', 'cr'];

const DEBIT_TOKENS = /^(dr|debit|d|withdrawal)$/i;
const CREDIT_TOKENS = /^(cr|credit|c|deposit)$/i;

function normalizeHeader(column: string): string {
  return column.toLowerCase().trim().replace(/[_\s]+/g, ' ');
}

function headerWords(column: string): string[] {
  return normalizeHeader(column).split(/[^a-z/]+/).filter(Boolean);
}

export class HeuristicStructuralAnalyzer implements StructuralAnalyzer {
  async analyze(sample: RawFrame): Promise<StructuralInfo> {
    const dateColumn = this.findDateColumn(sample);
    const dateFormat = this.detectDateFormat(sample, dateColumn);
    const amount = this.detectAmount(sample, dateColumn);

    const info = freezeStructuralInfo({ dateColumn, dateFormat, amount });
    assertDateFormatMatchesSample(info, sample);
    return info;
  }

  /**
   * Count of values in `column` that parse under `format`.
   */
  private countParsed(sample: RawFrame, column: string, format: string): number {
    return (sample.data[column] ?? []).filter(
      (v) => !isBlank(v) && parseDateWithFormat(v, format) !== null
    ).length;
  }

  private bestFormat(sample: RawFrame, column: string): { format: string; count: number } {
    let best: { format: string; count: number } = { format: CANDIDATE_DATE_FORMATS[0], count: 0 };
    for (const format of CANDIDATE_DATE_FORMATS) {
      const count = this.countParsed(sample, column, format);
      if (count > best.count) {
        best = { format, count };
      }
    }
    return best;
  }

  findDateColumn(sample: RawFrame): string {
    const byName =
      sample.columns.find((c) => DATE_HEADERS.includes(normalizeHeader(c))) ??
      sample.columns.find((c) => normalizeHeader(c).includes('date'));
    if (byName) return byName;

    // Fall back to the column with the most parseable dates
    let best: { column: string; count: number } | null = null;
    for (const column of sample.columns) {
      const { count } = this.bestFormat(sample, column);
      if (count > 0 && (!best || count > best.count)) {
        best = { column, count };
      }
    }

    if (!best) {
      throw new StructuralDiscoveryFailure('No date column found', {
        columns: sample.columns,
      });
    }
    return best.column;
  }

  detectDateFormat(sample: RawFrame, dateColumn: string): string {
    const { format, count } = this.bestFormat(sample, dateColumn);
    if (count === 0) {
      throw new StructuralDiscoveryFailure(
        `No known date format matches column "${dateColumn}"`,
        { dateColumn }
      );
    }
    return format;
  }

  detectAmount(sample: RawFrame, dateColumn: string): AmountInfo {
    const candidates = sample.columns.filter((c) => c !== dateColumn);

    const debitColumn = candidates.find((c) =>
      headerWords(c).some((w) => DEBIT_KEYWORDS.includes(w))
    );
    const creditColumn = candidates.find(
      (c) => c !== debitColumn && headerWords(c).some((w) => CREDIT_KEYWORDS.includes(w))
    );
    const typeColumn = candidates.find((c) => TYPE_HEADERS.includes(normalizeHeader(c)));

    if (debitColumn && creditColumn && debitColumn !== typeColumn && creditColumn !== typeColumn) {
      return { representation: 'dual_column_debit_credit', debitColumn, creditColumn };
    }

    const amountColumn =
      candidates.find((c) => AMOUNT_HEADERS.includes(normalizeHeader(c))) ??
      candidates.find(
        (c) => normalizeHeader(c).includes('amount') && !normalizeHeader(c).includes('balance')
      );

    if (!amountColumn) {
      throw new StructuralDiscoveryFailure('No amount column found', {
        columns: sample.columns,
      });
    }

    if (typeColumn) {
      const identifiers = this.detectTypeIdentifiers(sample, typeColumn);
      if (identifiers) {
        return {
          representation: 'single_column_with_type',
          amountColumn,
          typeColumn,
          ...identifiers,
        };
      }
    }

    const numeric = (sample.data[amountColumn] ?? []).some((v) => parseAmount(v) !== null);
    if (!numeric) {
      throw new StructuralDiscoveryFailure(`Column "${amountColumn}" holds no amounts`, {
        amountColumn,
      });
    }

    return { representation: 'single_column_signed', amountColumn };
  }

  private detectTypeIdentifiers(
    sample: RawFrame,
    typeColumn: string
  ): { debitIdentifier: string; creditIdentifier: string } | null {
    const values = (sample.data[typeColumn] ?? [])
      .filter((v) => !isBlank(v))
      .map((v) => String(v).trim());

    const debitIdentifier = values.find((v) => DEBIT_TOKENS.test(v));
    const creditIdentifier = values.find((v) => CREDIT_TOKENS.test(v));

    return debitIdentifier && creditIdentifier ? { debitIdentifier, creditIdentifier } : null;
  }
}
