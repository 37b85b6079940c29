/**
 * Schema Guard
 *
 * Last-resort integrity check on everything a processor emits. Output rows
 * are rebuilt with exactly the five storage fields, in storage order,
 * each coerced to its canonical type. A required field that is missing or
 * cannot be converted raises SchemaViolation; it is not a row filter.
 */

import { format, isValid } from 'date-fns';

import { SchemaViolation } from '@/lib/errors';
import {
  UNCATEGORIZED,
  type FinalTable,
  type FinalTransaction,
} from '@/types/pipeline';

import { parseAmount } from './amount-parser';
import { isIsoCalendarDate } from './date-format';
import type { ProcessorResult, TransactionProcessor } from './processor';

// ============================================
// Field Coercion
// ============================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Read a field by its canonical name or its snake_case alias. */
function readField(row: Record<string, unknown>, name: string, alias?: string): unknown {
  if (row[name] !== undefined) return row[name];
  return alias !== undefined ? row[alias] : undefined;
}

function coerceDescription(value: unknown, rowIndex: number): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  throw new SchemaViolation(
    value === undefined || value === null
      ? `Row ${rowIndex}: description is missing`
      : `Row ${rowIndex}: description is not text`,
    'description',
    rowIndex
  );
}

function coerceDate(value: unknown, rowIndex: number): string {
  if (value instanceof Date) {
    if (isValid(value)) return format(value, 'yyyy-MM-dd');
  } else if (typeof value === 'string') {
    const datePart = value.trim().slice(0, 10);
    if (isIsoCalendarDate(datePart)) return datePart;
  }

  throw new SchemaViolation(
    value === undefined || value === null
      ? `Row ${rowIndex}: transactionDate is missing`
      : `Row ${rowIndex}: transactionDate ${JSON.stringify(value)} is not a valid date`,
    'transactionDate',
    rowIndex
  );
}

function coerceAmount(value: unknown, rowIndex: number): number {
  if (typeof value === 'number' || typeof value === 'string') {
    const parsed = parseAmount(value);
    if (parsed !== null) return parsed;
  }

  throw new SchemaViolation(
    value === undefined || value === null
      ? `Row ${rowIndex}: amount is missing`
      : `Row ${rowIndex}: amount ${JSON.stringify(value)} is not a number`,
    'amount',
    rowIndex
  );
}

function coerceLabel(value: unknown, fallback: string): string {
  if (value === undefined || value === null) return fallback;
  const text = String(value).trim();
  return text || fallback;
}

// ============================================
// Guard
// ============================================

/**
 * Normalize rows to the five-field storage contract.
 */
export function enforceOutputSchema(rows: unknown): FinalTable {
  if (!Array.isArray(rows)) {
    throw new SchemaViolation('Processor output is not a list of rows', 'rows');
  }

  return rows.map((row: unknown, rowIndex): FinalTransaction => {
    if (!isRecord(row)) {
      throw new SchemaViolation(`Row ${rowIndex} is not a record`, 'row', rowIndex);
    }

    return {
      description: coerceDescription(readField(row, 'description'), rowIndex),
      transactionDate: coerceDate(readField(row, 'transactionDate', 'transaction_date'), rowIndex),
      amount: coerceAmount(readField(row, 'amount'), rowIndex),
      category: coerceLabel(readField(row, 'category'), UNCATEGORIZED),
      subCategory: coerceLabel(readField(row, 'subCategory', 'sub_category'), ''),
    };
  });
}

/**
 * Wrap a processor so its output always passes through the guard.
 */
export function withSchemaGuard<Row>(
  processor: TransactionProcessor<Row>
): TransactionProcessor<FinalTransaction> {
  return {
    name: processor.name,
    async process(raw, onProgress): Promise<ProcessorResult<FinalTransaction>> {
      const result = await processor.process(raw, onProgress);
      return { ...result, rows: enforceOutputSchema(result.rows) };
    },
  };
}
