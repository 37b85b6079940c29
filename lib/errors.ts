/**
 * Custom Error Classes for the statement pipeline
 *
 * Every error carries the stage it came from, a machine-readable code and
 * whether the pipeline (or the caller) can recover from it.
 */

export type PipelineStage =
  | 'input'
  | 'structural_analysis'
  | 'semantic_mapping'
  | 'extraction'
  | 'categorization'
  | 'schema_guard'
  | 'persistence'
  | 'inference';

export class PipelineError extends Error {
  constructor(
    message: string,
    public code: string,
    public stage: PipelineStage,
    public recoverable: boolean = true,
    public context: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'PipelineError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * No usable date/amount structure could be found. Fatal.
 */
export class StructuralDiscoveryFailure extends PipelineError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'STRUCTURAL_DISCOVERY_FAILED', 'structural_analysis', false, context);
    this.name = 'StructuralDiscoveryFailure';
  }
}

/**
 * The description column could not be identified. Recovered locally by
 * falling back to keyword matching or column concatenation.
 */
export class SemanticMappingFailure extends PipelineError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'SEMANTIC_MAPPING_FAILED', 'semantic_mapping', true, context);
    this.name = 'SemanticMappingFailure';
  }
}

export type RowExtractionField = 'date' | 'amount' | 'type_indicator';

/**
 * A single row could not be extracted. The row is dropped.
 */
export class RowExtractionError extends PipelineError {
  constructor(
    message: string,
    public rowIndex: number,
    public field: RowExtractionField,
    public rawValue: unknown
  ) {
    super(message, 'ROW_EXTRACTION_FAILED', 'extraction', true, {
      rowIndex,
      field,
    });
    this.name = 'RowExtractionError';
  }
}

/**
 * A categorization batch exhausted its retries. Its rows are defaulted.
 */
export class CategorizationBatchFailure extends PipelineError {
  constructor(
    message: string,
    public batchIndex: number,
    public attempts: number,
    public cause?: unknown
  ) {
    super(message, 'CATEGORIZATION_BATCH_FAILED', 'categorization', true, {
      batchIndex,
      attempts,
    });
    this.name = 'CategorizationBatchFailure';
  }
}

/**
 * The aggregate output cannot satisfy the storage contract. Fatal.
 */
export class SchemaViolation extends PipelineError {
  constructor(
    message: string,
    public field: string,
    public rowIndex: number | null = null
  ) {
    super(message, 'SCHEMA_VIOLATION', 'schema_guard', false, { field, rowIndex });
    this.name = 'SchemaViolation';
  }
}

export type ConstraintKind = 'unique' | 'foreign_key' | 'not_null';

/**
 * A store constraint rejected a row. Rolls back the enclosing
 * transaction and is never retryable.
 */
export class ConstraintViolation extends PipelineError {
  constructor(
    message: string,
    public constraintKind: ConstraintKind,
    public rowIndex: number | null = null,
    public column: string | null = null
  ) {
    super(message, 'CONSTRAINT_VIOLATION', 'persistence', false, {
      constraintKind,
      rowIndex,
      column,
    });
    this.name = 'ConstraintViolation';
  }
}

/**
 * Connection, lock or timeout failure against the store or the
 * inference service. Retryable by the caller.
 */
export class ConnectivityError extends PipelineError {
  constructor(
    message: string,
    public source: 'inference' | 'storage',
    public reason: 'timeout' | 'connection_refused' | 'lock' | 'closed' | 'unknown' = 'unknown'
  ) {
    super(
      message,
      'CONNECTIVITY_ERROR',
      source === 'inference' ? 'inference' : 'persistence',
      true,
      { source, reason }
    );
    this.name = 'ConnectivityError';
  }
}

/**
 * A TransactionContext was used after reaching a terminal state.
 */
export class TransactionStateError extends PipelineError {
  constructor(message: string) {
    super(message, 'TRANSACTION_CLOSED', 'persistence', false);
    this.name = 'TransactionStateError';
  }
}

/**
 * Handles errors in a standardized way, producing a single message
 * naming the stage and cause.
 */
export function handleError(error: unknown): string {
  if (error instanceof PipelineError) {
    return `[${error.stage}] ${error.message}`;
  }

  if (error instanceof Error) {
    console.error('Unknown error:', error);
    return `Something went wrong: ${error.message}`;
  }

  console.error('Unknown error:', error);
  return 'An unexpected error occurred.';
}
