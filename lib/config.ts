/**
 * Pipeline Configuration
 *
 * Configuration is an explicit value handed to each component's
 * constructor. `loadPipelineConfig()` is a convenience for reading it
 * from environment variables; nothing here is a process-wide singleton.
 */

import { z } from 'zod';

// ============================================
// Schemas
// ============================================

export const HierarchyCachePolicySchema = z.enum(['none', 'per-run', 'session']);

export type HierarchyCachePolicy = z.infer<typeof HierarchyCachePolicySchema>;

export const PipelineConfigSchema = z.object({
  /** Rows per categorization request */
  batchSize: z.number().int().positive().default(25),

  /** Extra attempts per categorization batch after the first */
  maxRetries: z.number().int().min(0).default(1),

  /** Base delay for exponential backoff between attempts (ms) */
  retryDelayMs: z.number().int().min(0).default(500),

  /** Rows taken from the head and from the tail of the frame for the structural sample */
  structuralSampleSize: z.number().int().positive().default(20),

  /** Rows taken at random from the middle of the frame */
  middleSampleSize: z.number().int().min(0).default(10),

  /** Seed for the middle-slice RNG so samples are reproducible */
  sampleSeed: z.number().int().default(42),

  /** Maximum length of a concatenated fallback description */
  descriptionMaxLength: z.number().int().positive().default(500),

  /** How long a category hierarchy snapshot may be reused */
  hierarchyCachePolicy: HierarchyCachePolicySchema.default('per-run'),

  /** Log prompts and raw model output */
  debug: z.boolean().default(false),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

export const InferenceConfigSchema = z.object({
  provider: z.enum(['ollama', 'gemini']).default('ollama'),
  baseUrl: z.string().url().default('http://localhost:11434'),
  model: z.string().min(1).default('llama3.1'),
  apiKey: z.string().default(''),
  timeoutMs: z.number().int().positive().default(30_000),
  temperature: z.number().min(0).max(2).default(0.05),
  maxTokens: z.number().int().positive().default(4096),
});

export type InferenceConfig = z.infer<typeof InferenceConfigSchema>;
export type InferenceConfigInput = z.input<typeof InferenceConfigSchema>;

// ============================================
// Resolution
// ============================================

export function resolvePipelineConfig(
  input: PipelineConfigInput = {}
): PipelineConfig {
  return PipelineConfigSchema.parse(input);
}

export function resolveInferenceConfig(
  input: InferenceConfigInput = {}
): InferenceConfig {
  return InferenceConfigSchema.parse(input);
}

function readInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function readBool(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return ['1', 'true', 'yes'].includes(value.toLowerCase());
}

/**
 * Build both configurations from environment variables.
 * Unset variables fall back to the schema defaults; invalid values throw
 * a ZodError naming the offending field.
 */
export function loadPipelineConfig(
  env: Record<string, string | undefined> = process.env
): { pipeline: PipelineConfig; inference: InferenceConfig } {
  const pipeline = resolvePipelineConfig({
    batchSize: readInt(env.PIPELINE_BATCH_SIZE),
    maxRetries: readInt(env.PIPELINE_MAX_RETRIES),
    retryDelayMs: readInt(env.PIPELINE_RETRY_DELAY_MS),
    structuralSampleSize: readInt(env.PIPELINE_SAMPLE_SIZE),
    middleSampleSize: readInt(env.PIPELINE_MIDDLE_SAMPLE_SIZE),
    descriptionMaxLength: readInt(env.PIPELINE_DESCRIPTION_MAX_LENGTH),
    hierarchyCachePolicy: HierarchyCachePolicySchema.optional().parse(
      env.PIPELINE_HIERARCHY_CACHE || undefined
    ),
    debug: readBool(env.PIPELINE_DEBUG),
  });

  const provider = env.INFERENCE_PROVIDER === 'gemini' ? 'gemini' : 'ollama';

  const inference = resolveInferenceConfig({
    provider,
    baseUrl:
      env.INFERENCE_BASE_URL ||
      (provider === 'gemini'
        ? 'https://generativelanguage.googleapis.com/v1beta'
        : undefined),
    model: env.INFERENCE_MODEL || (provider === 'gemini' ? 'gemini-2.0-flash-lite' : undefined),
    apiKey: env.GOOGLE_GEMINI_API_KEY || env.INFERENCE_API_KEY || undefined,
    timeoutMs: readInt(env.INFERENCE_TIMEOUT_MS),
  });

  return { pipeline, inference };
}
