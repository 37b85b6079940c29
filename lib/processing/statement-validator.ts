/**
 * Statement Validator
 *
 * Consistency checks over extracted rows. Nothing here drops a row; every
 * finding becomes an ExtractionWarning keyed by source row index:
 *
 * - rows sharing date, amount and description (possible duplicates)
 * - a date more than a year before the previous row's date
 * - a running balance that does not follow from the previous balance
 */

import { differenceInCalendarDays, parseISO } from 'date-fns';

import type { NormalizedTransaction, RawFrame } from '@/types/pipeline';

import { parseAmount, roundAmount } from './amount-parser';
import { getCell } from './frame';
import type { ExtractionWarning } from './extractor';

// ============================================
// Types
// ============================================

export interface StatementValidationInput {
  transactions: readonly NormalizedTransaction[];

  /** Source row index of each transaction */
  sourceRowIndices: readonly number[];

  /** Running balance of each transaction, when the statement has one */
  balances?: ReadonlyArray<number | null>;
}

/** Backward jumps longer than this many days are reported */
export const MAX_BACKWARD_DAYS = 365;

/** Balance differences up to this are rounding */
export const BALANCE_TOLERANCE = 0.01;

// ============================================
// Balance Column
// ============================================

/**
 * First column whose header mentions a balance, skipping columns another
 * stage already uses.
 */
export function findBalanceColumn(
  columns: readonly string[],
  usedColumns: ReadonlySet<string>
): string | null {
  return (
    columns.find((c) => !usedColumns.has(c) && c.toLowerCase().includes('balance')) ?? null
  );
}

/**
 * Parsed balance for each extracted row (null where the cell is blank or
 * not a number).
 */
export function readBalances(
  raw: RawFrame,
  column: string,
  sourceRowIndices: readonly number[]
): Array<number | null> {
  return sourceRowIndices.map((rowIndex) => parseAmount(getCell(raw, column, rowIndex)));
}

// ============================================
// Checks
// ============================================

function duplicateWarnings(input: StatementValidationInput): ExtractionWarning[] {
  const groups = new Map<string, number[]>();

  input.transactions.forEach((tx, i) => {
    const key = JSON.stringify([tx.transactionDate, tx.amount, tx.description]);
    const group = groups.get(key) ?? [];
    group.push(i);
    groups.set(key, group);
  });

  const warnings: ExtractionWarning[] = [];
  for (const group of groups.values()) {
    if (group.length < 2) continue;
    const rows = group.map((i) => input.sourceRowIndices[i] ?? i);
    for (const rowIndex of rows) {
      warnings.push({
        rowIndex,
        message: `Possible duplicate transaction (rows ${rows.join(', ')})`,
      });
    }
  }
  return warnings;
}

function dateJumpWarnings(input: StatementValidationInput): ExtractionWarning[] {
  const warnings: ExtractionWarning[] = [];

  for (let i = 1; i < input.transactions.length; i++) {
    const previous = input.transactions[i - 1];
    const current = input.transactions[i];
    if (!previous || !current) continue;

    const days = differenceInCalendarDays(
      parseISO(previous.transactionDate),
      parseISO(current.transactionDate)
    );
    if (days > MAX_BACKWARD_DAYS) {
      warnings.push({
        rowIndex: input.sourceRowIndices[i] ?? i,
        message: `Date jumps back from ${previous.transactionDate} to ${current.transactionDate}`,
      });
    }
  }
  return warnings;
}

function balanceWarnings(input: StatementValidationInput): ExtractionWarning[] {
  const balances = input.balances;
  if (!balances) return [];

  const warnings: ExtractionWarning[] = [];
  for (let i = 1; i < input.transactions.length; i++) {
    const previous = balances[i - 1];
    const current = balances[i];
    const tx = input.transactions[i];
    if (previous === null || previous === undefined) continue;
    if (current === null || current === undefined || !tx) continue;

    const expected = roundAmount(previous + tx.amount);
    if (Math.abs(current - expected) > BALANCE_TOLERANCE) {
      warnings.push({
        rowIndex: input.sourceRowIndices[i] ?? i,
        message: `Balance ${current} does not follow from ${previous} and amount ${tx.amount} (expected ${expected})`,
      });
    }
  }
  return warnings;
}

// ============================================
// Public API
// ============================================

/**
 * All consistency warnings, ordered by source row.
 */
export function validateStatement(input: StatementValidationInput): ExtractionWarning[] {
  const warnings = [
    ...duplicateWarnings(input),
    ...dateJumpWarnings(input),
    ...balanceWarnings(input),
  ];

  if (warnings.length > 0) {
    console.warn(`[StatementValidator] ${warnings.length} consistency warning(s)`);
  }

  // Stable sort: checks keep their order within a row
  return warnings.sort((a, b) => a.rowIndex - b.rowIndex);
}
