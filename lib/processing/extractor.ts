/**
 * Extractor
 *
 * Applies the structural and semantic results to every row of the raw
 * frame. Deterministic and local: no inference calls. Rows whose date,
 * amount or type indicator cannot be read are dropped and reported;
 * they never fail the whole frame.
 */

import { RowExtractionError } from '@/lib/errors';
import type {
  AmountInfo,
  CellValue,
  NormalizedTransaction,
  RawFrame,
  SemanticMapping,
  StructuralInfo,
} from '@/types/pipeline';

import { parseAmount, roundAmount } from './amount-parser';
import { parseDateWithFormat } from './date-format';
import { getCell, isBlank, rowCount } from './frame';

// ============================================
// Types
// ============================================

export interface ExtractionWarning {
  rowIndex: number;
  message: string;
}

export interface ExtractionResult {
  /** Extracted rows, in source order */
  transactions: NormalizedTransaction[];

  /** Source row index of each extracted transaction */
  sourceRowIndices: number[];

  /** One entry per dropped row */
  droppedRows: RowExtractionError[];

  /** Non-fatal oddities (e.g. debit and credit both populated) */
  warnings: ExtractionWarning[];
}

export interface ExtractorOptions {
  /** Maximum length of a concatenated fallback description */
  descriptionMaxLength?: number;
}

const DEFAULT_DESCRIPTION_MAX_LENGTH = 500;
const FALLBACK_SEPARATOR = ' | ';

// ============================================
// Helpers
// ============================================

function cellText(value: CellValue): string {
  return value === null || value === undefined ? '' : String(value).trim();
}

function normalizeIndicator(value: string): string {
  return value.trim().replace(/[.\s]+$/, '').toLowerCase();
}

// ============================================
// Extractor
// ============================================

export class Extractor {
  private descriptionMaxLength: number;

  constructor(options: ExtractorOptions = {}) {
    this.descriptionMaxLength = options.descriptionMaxLength ?? DEFAULT_DESCRIPTION_MAX_LENGTH;
  }

  extract(
    raw: RawFrame,
    structural: StructuralInfo,
    semantic: SemanticMapping
  ): ExtractionResult {
    const result: ExtractionResult = {
      transactions: [],
      sourceRowIndices: [],
      droppedRows: [],
      warnings: [],
    };

    const total = rowCount(raw);
    for (let i = 0; i < total; i++) {
      try {
        result.transactions.push(this.extractRow(raw, i, structural, semantic, result.warnings));
        result.sourceRowIndices.push(i);
      } catch (error) {
        if (!(error instanceof RowExtractionError)) throw error;
        console.warn(`[Extractor] Dropped row ${i}: ${error.message}`);
        result.droppedRows.push(error);
      }
    }

    if (result.droppedRows.length > 0) {
      console.warn(
        `[Extractor] Extracted ${result.transactions.length} of ${total} rows, dropped ${result.droppedRows.length}`
      );
    }

    return result;
  }

  private extractRow(
    raw: RawFrame,
    rowIndex: number,
    structural: StructuralInfo,
    semantic: SemanticMapping,
    warnings: ExtractionWarning[]
  ): NormalizedTransaction {
    const rawDate = getCell(raw, structural.dateColumn, rowIndex);
    const transactionDate = parseDateWithFormat(rawDate, structural.dateFormat);
    if (!transactionDate) {
      throw new RowExtractionError(
        `Date ${JSON.stringify(rawDate ?? null)} does not match format "${structural.dateFormat}"`,
        rowIndex,
        'date',
        rawDate
      );
    }

    const amount = this.extractAmount(raw, rowIndex, structural.amount, warnings);

    return {
      description: this.extractDescription(raw, rowIndex, semantic),
      transactionDate,
      amount,
    };
  }

  /**
   * Signed amount for one row: negative = debit, positive = credit.
   */
  extractAmount(
    raw: RawFrame,
    rowIndex: number,
    info: AmountInfo,
    warnings: ExtractionWarning[] = []
  ): number {
    switch (info.representation) {
      case 'dual_column_debit_credit': {
        const debit = this.readOptionalAmount(raw, rowIndex, info.debitColumn);
        const credit = this.readOptionalAmount(raw, rowIndex, info.creditColumn);
        if (debit !== 0 && credit !== 0) {
          warnings.push({
            rowIndex,
            message: `Both debit (${debit}) and credit (${credit}) populated; netted`,
          });
        }
        return roundAmount(credit - debit);
      }

      case 'single_column_signed':
        return this.readRequiredAmount(raw, rowIndex, info.amountColumn);

      case 'single_column_with_type': {
        const magnitude = Math.abs(this.readRequiredAmount(raw, rowIndex, info.amountColumn));
        const rawIndicator = getCell(raw, info.typeColumn, rowIndex);
        const indicator = normalizeIndicator(cellText(rawIndicator));

        if (indicator && indicator === normalizeIndicator(info.debitIdentifier)) {
          return roundAmount(-magnitude);
        }
        if (indicator && indicator === normalizeIndicator(info.creditIdentifier)) {
          return magnitude;
        }
        throw new RowExtractionError(
          `Type indicator ${JSON.stringify(rawIndicator ?? null)} is neither "${info.debitIdentifier}" nor "${info.creditIdentifier}"`,
          rowIndex,
          'type_indicator',
          rawIndicator
        );
      }
    }
  }

  /** Blank cells count as zero; non-blank cells must parse. */
  private readOptionalAmount(raw: RawFrame, rowIndex: number, column: string): number {
    const value = getCell(raw, column, rowIndex);
    if (isBlank(value)) return 0;

    const parsed = parseAmount(value);
    if (parsed === null) {
      throw new RowExtractionError(
        `Amount ${JSON.stringify(value)} in "${column}" is not a number`,
        rowIndex,
        'amount',
        value
      );
    }
    return parsed;
  }

  private readRequiredAmount(raw: RawFrame, rowIndex: number, column: string): number {
    const value = getCell(raw, column, rowIndex);
    const parsed = parseAmount(value);
    if (parsed === null) {
      throw new RowExtractionError(
        `Amount ${JSON.stringify(value ?? null)} in "${column}" is not a number`,
        rowIndex,
        'amount',
        value
      );
    }
    return parsed;
  }

  private extractDescription(raw: RawFrame, rowIndex: number, semantic: SemanticMapping): string {
    if (semantic.descriptionColumn !== null) {
      return cellText(getCell(raw, semantic.descriptionColumn, rowIndex));
    }

    const joined = semantic.fallbackColumns
      .map((column) => cellText(getCell(raw, column, rowIndex)))
      .filter(Boolean)
      .join(FALLBACK_SEPARATOR);

    return joined.slice(0, this.descriptionMaxLength);
  }
}
