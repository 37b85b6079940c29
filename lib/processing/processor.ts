/**
 * Transaction Processors
 *
 * A processor turns a raw frame into categorized rows. Both concrete
 * processors run the same stages (structural → semantic → extraction →
 * categorization) and differ in how each stage decides:
 *
 * - AIDataProcessor asks the inference service at every stage
 * - RuleBasedDataProcessor uses header keywords and keyword rules
 *
 * Callers should obtain processors from `createAIProcessor` /
 * `createRuleBasedProcessor`, which wrap them in the schema guard.
 */

import type { LLMClient } from '@/lib/ai/llm-client';
import {
  resolvePipelineConfig,
  type PipelineConfig,
  type PipelineConfigInput,
} from '@/lib/config';
import { PipelineError, type RowExtractionError } from '@/lib/errors';
import type {
  BatchOutcome,
  CategorizedTransaction,
  CategoryHierarchy,
  FinalTransaction,
  ProgressCallback,
  RawFrame,
  SemanticMapping,
  StructuralInfo,
} from '@/types/pipeline';

import { RuleBasedCategorizer } from './auto-categorizer';
import { Categorizer } from './categorizer';
import { Extractor, type ExtractionResult, type ExtractionWarning } from './extractor';
import { createDataSample, rowCount } from './frame';
import { withSchemaGuard } from './schema-guard';
import { findBalanceColumn, readBalances, validateStatement } from './statement-validator';
import { KeywordSemanticMapper, LLMSemanticMapper, type SemanticMapper } from './semantic-mapper';
import {
  getConsumedColumns,
  HeuristicStructuralAnalyzer,
  LLMStructuralAnalyzer,
  type StructuralAnalyzer,
} from './structural-analyzer';

// ============================================
// Types
// ============================================

/**
 * Everything a run learned besides the rows themselves.
 */
export interface ProcessingReport {
  inputRows: number;
  extractedRows: number;
  droppedRows: RowExtractionError[];
  warnings: ExtractionWarning[];
  defaultedRows: number;
  batchOutcomes: BatchOutcome[];
  structural: StructuralInfo;
  semantic: SemanticMapping;
  cancelled: boolean;
}

export interface ProcessorResult<Row> {
  rows: Row[];
  report: ProcessingReport;
}

export interface TransactionProcessor<Row = CategorizedTransaction> {
  readonly name: string;
  process(raw: RawFrame, onProgress?: ProgressCallback | null): Promise<ProcessorResult<Row>>;
}

/**
 * Read access to the category hierarchy used as prompt context.
 */
export interface HierarchySource {
  getHierarchy(): Promise<CategoryHierarchy>;
}

/** Progress checkpoints shared by both processors */
export const PROGRESS = {
  start: 0,
  structural: 0.33,
  semantic: 0.66,
  done: 1,
} as const;

// ============================================
// Shared Stages
// ============================================

function assertNotEmpty(raw: RawFrame): number {
  const total = rowCount(raw);
  if (raw.columns.length === 0 || total === 0) {
    throw new PipelineError('Input frame is empty', 'EMPTY_INPUT', 'input', false);
  }
  return total;
}

interface DiscoveryStages {
  analyzer: StructuralAnalyzer;
  mapper: SemanticMapper;
  config: PipelineConfig;
}

async function discover(
  raw: RawFrame,
  stages: DiscoveryStages,
  onProgress?: ProgressCallback | null
): Promise<{ structural: StructuralInfo; semantic: SemanticMapping }> {
  const sample = createDataSample(raw, {
    edgeSize: stages.config.structuralSampleSize,
    middleSize: stages.config.middleSampleSize,
    seed: stages.config.sampleSeed,
  });

  onProgress?.(PROGRESS.start, 'Starting structural analysis...');

  let structural: StructuralInfo;
  try {
    structural = await stages.analyzer.analyze(sample);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error('[Processor] Structural analysis failed:', message);
    onProgress?.(PROGRESS.done, `Error: ${message}`);
    throw error;
  }
  onProgress?.(PROGRESS.structural, 'Structural analysis complete.');

  const semantic = await stages.mapper.map(sample, getConsumedColumns(structural));
  onProgress?.(
    PROGRESS.semantic,
    semantic.source === 'llm'
      ? 'Semantic mapping complete.'
      : `Semantic mapping complete (${semantic.source} fallback).`
  );

  return { structural, semantic };
}

/**
 * Extraction warnings followed by the statement consistency warnings.
 */
function collectWarnings(
  raw: RawFrame,
  structural: StructuralInfo,
  semantic: SemanticMapping,
  extraction: ExtractionResult
): ExtractionWarning[] {
  const used = getConsumedColumns(structural);
  for (const column of semantic.fallbackColumns) used.add(column);
  if (semantic.descriptionColumn !== null) used.add(semantic.descriptionColumn);

  const balanceColumn = findBalanceColumn(raw.columns, used);

  return [
    ...extraction.warnings,
    ...validateStatement({
      transactions: extraction.transactions,
      sourceRowIndices: extraction.sourceRowIndices,
      balances: balanceColumn
        ? readBalances(raw, balanceColumn, extraction.sourceRowIndices)
        : undefined,
    }),
  ];
}

// ============================================
// AI Processor
// ============================================

export interface AIDataProcessorDeps {
  client: LLMClient;
  hierarchySource: HierarchySource;
  config?: PipelineConfigInput;
  /** Override the structural pass (defaults to the LLM analyzer) */
  structuralAnalyzer?: StructuralAnalyzer;
  /** Override the semantic pass (defaults to the LLM mapper) */
  semanticMapper?: SemanticMapper;
}

export class AIDataProcessor implements TransactionProcessor<CategorizedTransaction> {
  readonly name = 'ai';

  private config: PipelineConfig;
  private analyzer: StructuralAnalyzer;
  private mapper: SemanticMapper;
  private extractor: Extractor;
  private categorizer: Categorizer;
  private hierarchySource: HierarchySource;

  constructor(deps: AIDataProcessorDeps) {
    this.config = resolvePipelineConfig(deps.config);
    const debug = this.config.debug;

    this.hierarchySource = deps.hierarchySource;
    this.analyzer = deps.structuralAnalyzer ?? new LLMStructuralAnalyzer(deps.client, { debug });
    this.mapper = deps.semanticMapper ?? new LLMSemanticMapper(deps.client, { debug });
    this.extractor = new Extractor({ descriptionMaxLength: this.config.descriptionMaxLength });
    this.categorizer = new Categorizer(deps.client, {
      batchSize: this.config.batchSize,
      maxRetries: this.config.maxRetries,
      retryDelayMs: this.config.retryDelayMs,
      debug,
    });
  }

  async process(
    raw: RawFrame,
    onProgress?: ProgressCallback | null
  ): Promise<ProcessorResult<CategorizedTransaction>> {
    const inputRows = assertNotEmpty(raw);

    const { structural, semantic } = await discover(
      raw,
      { analyzer: this.analyzer, mapper: this.mapper, config: this.config },
      onProgress
    );

    const extraction = this.extractor.extract(raw, structural, semantic);
    const hierarchy = await this.hierarchySource.getHierarchy();

    const categorization = await this.categorizer.categorize(
      extraction.transactions,
      hierarchy,
      onProgress,
      { start: PROGRESS.semantic, end: PROGRESS.done }
    );

    onProgress?.(PROGRESS.done, 'Processing complete.');

    return {
      rows: categorization.transactions,
      report: {
        inputRows,
        extractedRows: extraction.transactions.length,
        droppedRows: extraction.droppedRows,
        warnings: collectWarnings(raw, structural, semantic, extraction),
        defaultedRows: categorization.defaultedRows,
        batchOutcomes: categorization.outcomes,
        structural,
        semantic,
        cancelled: categorization.cancelled,
      },
    };
  }
}

// ============================================
// Rule-Based Processor
// ============================================

export interface RuleBasedDataProcessorDeps {
  config?: PipelineConfigInput;
  categorizer?: RuleBasedCategorizer;
}

export class RuleBasedDataProcessor implements TransactionProcessor<CategorizedTransaction> {
  readonly name = 'rule-based';

  private config: PipelineConfig;
  private analyzer = new HeuristicStructuralAnalyzer();
  private mapper = new KeywordSemanticMapper();
  private extractor: Extractor;
  private categorizer: RuleBasedCategorizer;

  constructor(deps: RuleBasedDataProcessorDeps = {}) {
    this.config = resolvePipelineConfig(deps.config);
    this.extractor = new Extractor({ descriptionMaxLength: this.config.descriptionMaxLength });
    this.categorizer = deps.categorizer ?? new RuleBasedCategorizer();
  }

  async process(
    raw: RawFrame,
    onProgress?: ProgressCallback | null
  ): Promise<ProcessorResult<CategorizedTransaction>> {
    const inputRows = assertNotEmpty(raw);

    const { structural, semantic } = await discover(
      raw,
      { analyzer: this.analyzer, mapper: this.mapper, config: this.config },
      onProgress
    );

    const extraction = this.extractor.extract(raw, structural, semantic);
    const rows = this.categorizer.categorize(extraction.transactions);

    onProgress?.(PROGRESS.done, 'Processing complete.');

    return {
      rows,
      report: {
        inputRows,
        extractedRows: extraction.transactions.length,
        droppedRows: extraction.droppedRows,
        warnings: collectWarnings(raw, structural, semantic, extraction),
        defaultedRows: 0,
        batchOutcomes: [],
        structural,
        semantic,
        cancelled: false,
      },
    };
  }
}

// ============================================
// Factories
// ============================================

export function createAIProcessor(
  deps: AIDataProcessorDeps
): TransactionProcessor<FinalTransaction> {
  return withSchemaGuard(new AIDataProcessor(deps));
}

export function createRuleBasedProcessor(
  deps: RuleBasedDataProcessorDeps = {}
): TransactionProcessor<FinalTransaction> {
  return withSchemaGuard(new RuleBasedDataProcessor(deps));
}
