/**
 * Processing Module - Barrel Export
 *
 * The normalization pipeline: structural discovery, semantic mapping,
 * extraction, categorization and the output schema guard.
 */

// ============================================
// Processors
// ============================================

export {
  AIDataProcessor,
  RuleBasedDataProcessor,
  createAIProcessor,
  createRuleBasedProcessor,
  PROGRESS,
  type TransactionProcessor,
  type ProcessorResult,
  type ProcessingReport,
  type HierarchySource,
  type AIDataProcessorDeps,
  type RuleBasedDataProcessorDeps,
} from './processor';

// ============================================
// Stages
// ============================================

export {
  LLMStructuralAnalyzer,
  HeuristicStructuralAnalyzer,
  getConsumedColumns,
  type StructuralAnalyzer,
} from './structural-analyzer';

export {
  LLMSemanticMapper,
  KeywordSemanticMapper,
  DESCRIPTION_KEYWORDS,
  type SemanticMapper,
} from './semantic-mapper';

export { Extractor, type ExtractionResult, type ExtractionWarning } from './extractor';

export { Categorizer, type CategorizationResult, type CategorizerOptions } from './categorizer';

export { RuleBasedCategorizer, DEFAULT_CATEGORY_RULES, type CategoryRules } from './auto-categorizer';

export { enforceOutputSchema, withSchemaGuard } from './schema-guard';

export { validateStatement, findBalanceColumn, type StatementValidationInput } from './statement-validator';

// ============================================
// Helpers
// ============================================

export { parseAmount, roundAmount } from './amount-parser';
export { isIsoCalendarDate, parseDateWithFormat, strftimeToDateFns } from './date-format';
export { createDataSample, frameFromRows, matchColumn, rowCount } from './frame';
