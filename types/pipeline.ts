/**
 * Pipeline Types
 *
 * Shapes that flow between the stages of the normalization pipeline:
 * raw frame → structural info → semantic mapping → normalized rows →
 * categorized rows → final table.
 */

// ============================================
// Raw Input
// ============================================

/** A single untyped cell as produced by a file parser. */
export type CellValue = string | number | null | undefined;

/**
 * Column-oriented table produced by an external parser.
 * `data[column][i]` is the value of row `i` in `column`.
 */
export interface RawFrame {
  /** Column names in source order */
  columns: string[];

  /** Column name → ordered cell values */
  data: Record<string, CellValue[]>;
}

/** One row of a RawFrame, keyed by column name. */
export type RawRow = Record<string, CellValue>;

// ============================================
// Structural Discovery
// ============================================

export type AmountRepresentation =
  | 'dual_column_debit_credit'
  | 'single_column_signed'
  | 'single_column_with_type';

export interface DualColumnAmount {
  representation: 'dual_column_debit_credit';
  debitColumn: string;
  creditColumn: string;
}

export interface SignedColumnAmount {
  representation: 'single_column_signed';
  amountColumn: string;
}

export interface TypedColumnAmount {
  representation: 'single_column_with_type';
  amountColumn: string;
  typeColumn: string;
  /** Text in the type column marking a debit (e.g. "DR") */
  debitIdentifier: string;
  /** Text in the type column marking a credit (e.g. "CR") */
  creditIdentifier: string;
}

export type AmountInfo = DualColumnAmount | SignedColumnAmount | TypedColumnAmount;

/**
 * Result of the structural pass. Immutable once produced.
 */
export interface StructuralInfo {
  /** Column holding the transaction date */
  dateColumn: string;

  /** strftime-style format of the date column (e.g. `%m/%d/%Y`) */
  dateFormat: string;

  /** How the signed amount is encoded */
  amount: AmountInfo;
}

// ============================================
// Semantic Mapping
// ============================================

/**
 * Result of the semantic pass.
 * `descriptionColumn === null` means the extractor concatenates
 * `fallbackColumns` instead.
 */
export interface SemanticMapping {
  descriptionColumn: string | null;

  /** Unconsumed columns used when no description column was identified */
  fallbackColumns: string[];

  /** How the mapping was decided */
  source: 'llm' | 'keyword' | 'concatenation';
}

// ============================================
// Transactions
// ============================================

/** Output of the extractor. */
export interface NormalizedTransaction {
  description: string;

  /** ISO date (YYYY-MM-DD) */
  transactionDate: string;

  /** Negative = debit, positive = credit */
  amount: number;
}

/** Output of the categorizer. */
export interface CategorizedTransaction extends NormalizedTransaction {
  category: string;
  subCategory: string;
}

/**
 * A row of the final table. Field order matches the storage contract:
 * description, transactionDate, amount, category, subCategory.
 */
export interface FinalTransaction {
  description: string;
  transactionDate: string;
  amount: number;
  category: string;
  subCategory: string;
}

export type FinalTable = FinalTransaction[];

/** Fixed column order of the storage contract. */
export const FINAL_COLUMNS = [
  'description',
  'transactionDate',
  'amount',
  'category',
  'subCategory',
] as const satisfies ReadonlyArray<keyof FinalTransaction>;

/** Sentinel category used whenever categorization fails. */
export const UNCATEGORIZED = 'Uncategorized';

/**
 * Parent category name → sub-category names.
 */
export type CategoryHierarchy = Record<string, string[]>;

// ============================================
// Progress
// ============================================

/**
 * Progress callback. Returning `false` asks the categorizer to stop
 * sending further batches; any other return value is ignored.
 */
export type ProgressCallback = (
  fraction: number,
  message: string
) => void | boolean;

// ============================================
// Outcomes
// ============================================

export type BatchErrorKind =
  | 'inference_failed'
  | 'cancelled'
  | 'constraint_violation'
  | 'connectivity'
  | 'unknown';

/**
 * Outcome of one categorization batch or one persistence chunk.
 */
export interface BatchOutcome {
  batchIndex: number;
  success: boolean;
  rowsAffected: number;
  errorKind?: BatchErrorKind;
  failedRowIndices?: number[];
}
