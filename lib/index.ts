/**
 * Public API of the statement ledger pipeline.
 */

export * from './ai';
export * from './processing';
export * from './storage';
export * from './errors';
export {
  loadPipelineConfig,
  resolvePipelineConfig,
  resolveInferenceConfig,
  type PipelineConfig,
  type PipelineConfigInput,
  type InferenceConfig,
  type InferenceConfigInput,
  type HierarchyCachePolicy,
} from './config';
export {
  ImportService,
  createImportService,
  describeImportSummary,
  type ImportSummary,
  type ImportOptions,
  type ImportServiceDeps,
} from './pipeline/import-service';
export * from '@/types/pipeline';
export * from '@/types/database';
