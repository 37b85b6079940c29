/**
 * LLM Client
 *
 * Provides a unified interface for the external inference service used by
 * the structural, semantic and categorization passes.
 *
 * Two backends are supported:
 * - Ollama (local, `/api/generate`), the default for personal use
 * - Gemini (`generateContent`), when an API key is configured
 *
 * Timeouts and refused connections are surfaced as ConnectivityError so
 * callers can tell them apart from a model that answered badly.
 */

import { z } from 'zod';

import { ConnectivityError, PipelineError } from '@/lib/errors';
import {
  resolveInferenceConfig,
  type InferenceConfig,
  type InferenceConfigInput,
} from '@/lib/config';

// ============================================
// Types
// ============================================

/**
 * LLM provider types.
 */
export type LLMProvider = 'ollama' | 'gemini';

/**
 * LLM response.
 */
export interface LLMResponse {
  /** Generated text content */
  text: string;

  /** Token usage information */
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };

  /** Model used for generation */
  model: string;

  /** Generation time in milliseconds */
  generationTimeMs: number;
}

/**
 * Per-call generation overrides.
 */
export interface GenerationOverrides {
  temperature?: number;
  maxTokens?: number;
  /** Ask the backend for a JSON-only response where it supports it */
  json?: boolean;
}

/**
 * LLM client interface.
 */
export interface LLMClient {
  /** Generate a completion from a flat prompt string */
  generate(prompt: string, overrides?: GenerationOverrides): Promise<LLMResponse>;

  /** Check if client is configured and ready */
  isReady(): boolean;

  /** Get the current provider */
  getProvider(): LLMProvider;

  /** Get the current model */
  getModel(): string;
}

// ============================================
// Errors
// ============================================

/**
 * LLM-specific error.
 */
export class LLMError extends PipelineError {
  constructor(
    message: string,
    public statusCode?: number,
    recoverable: boolean = true
  ) {
    super(message, 'LLM_ERROR', 'inference', recoverable, { statusCode });
    this.name = 'LLMError';
  }
}

/**
 * Rate limit error.
 */
export class RateLimitError extends LLMError {
  constructor(
    message: string = 'Rate limit exceeded. Please try again later.',
    public retryAfterMs?: number
  ) {
    super(message, 429, true);
    this.name = 'RateLimitError';
  }
}

/**
 * Configuration error.
 */
export class LLMConfigError extends LLMError {
  constructor(message: string) {
    super(message, undefined, false);
    this.name = 'LLMConfigError';
  }
}

// ============================================
// Response Schemas
// ============================================

const OllamaGenerateResponseSchema = z.object({
  response: z.string(),
  model: z.string().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

const OllamaTagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })),
});

const GeminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({ parts: z.array(z.object({ text: z.string().optional() })) })
          .optional(),
        finishReason: z.string().optional(),
      })
    )
    .optional(),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().optional(),
      candidatesTokenCount: z.number().optional(),
      totalTokenCount: z.number().optional(),
    })
    .optional(),
});

const ErrorBodySchema = z.object({
  error: z.union([z.string(), z.object({ message: z.string() })]).optional(),
});

// ============================================
// Shared helpers
// ============================================

/**
 * Map a thrown fetch failure to a ConnectivityError where it is one.
 */
export function toConnectivityError(error: unknown, timeoutMs: number): unknown {
  if (error instanceof PipelineError) return error;

  if (error instanceof Error) {
    if (error.name === 'TimeoutError' || error.name === 'AbortError') {
      return new ConnectivityError(
        `Inference request timed out after ${timeoutMs}ms`,
        'inference',
        'timeout'
      );
    }

    const code =
      error.cause instanceof Error && 'code' in error.cause
        ? String(error.cause.code)
        : '';
    if (error instanceof TypeError || code === 'ECONNREFUSED') {
      return new ConnectivityError(
        `Inference service unreachable: ${error.message}${code ? ` (${code})` : ''}`,
        'inference',
        'connection_refused'
      );
    }
  }

  return error;
}

async function handleErrorResponse(response: Response): Promise<LLMError> {
  let errorMessage = `API error: ${response.status}`;

  const body = ErrorBodySchema.safeParse(await response.json().catch(() => ({})));
  if (body.success && body.data.error) {
    errorMessage =
      typeof body.data.error === 'string' ? body.data.error : body.data.error.message;
  }

  switch (response.status) {
    case 429: {
      const retryAfter = response.headers.get('Retry-After');
      return new RateLimitError(
        errorMessage,
        retryAfter ? parseInt(retryAfter, 10) * 1000 : undefined
      );
    }
    case 401:
      return new LLMConfigError('Invalid API key');
    case 403:
      return new LLMConfigError('API access forbidden. Check your API key permissions.');
    case 404:
      return new LLMConfigError(`Model or endpoint not found: ${errorMessage}`);
    case 400:
      return new LLMError(errorMessage, 400, false);
    case 500:
    case 502:
    case 503:
    case 504:
      return new LLMError(errorMessage, response.status, true);
    default:
      return new LLMError(errorMessage, response.status);
  }
}

// ============================================
// Ollama Client
// ============================================

export class OllamaClient implements LLMClient {
  private config: InferenceConfig;
  private baseUrl: string;

  constructor(config: InferenceConfigInput = {}) {
    this.config = resolveInferenceConfig({ ...config, provider: 'ollama' });
    this.baseUrl = this.config.baseUrl.replace(/\/+$/, '');
  }

  isReady(): boolean {
    return Boolean(this.baseUrl && this.config.model);
  }

  getProvider(): LLMProvider {
    return 'ollama';
  }

  getModel(): string {
    return this.config.model;
  }

  async generate(prompt: string, overrides?: GenerationOverrides): Promise<LLMResponse> {
    const startTime = performance.now();

    try {
      const response = await fetch(`${this.baseUrl}/api/generate`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.config.model,
          prompt,
          stream: false,
          ...(overrides?.json ? { format: 'json' } : {}),
          options: {
            temperature: overrides?.temperature ?? this.config.temperature,
            num_predict: overrides?.maxTokens ?? this.config.maxTokens,
          },
        }),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });

      if (!response.ok) {
        throw await handleErrorResponse(response);
      }

      const data = OllamaGenerateResponseSchema.parse(await response.json());
      const promptTokens = data.prompt_eval_count ?? 0;
      const completionTokens = data.eval_count ?? 0;

      return {
        text: data.response,
        model: data.model ?? this.config.model,
        generationTimeMs: performance.now() - startTime,
        usage: {
          promptTokens,
          completionTokens,
          totalTokens: promptTokens + completionTokens,
        },
      };
    } catch (error) {
      throw toConnectivityError(error, this.config.timeoutMs);
    }
  }

  /**
   * List models installed on the Ollama server.
   */
  async listModels(): Promise<string[]> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`, {
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
      if (!response.ok) {
        throw await handleErrorResponse(response);
      }
      const data = OllamaTagsResponseSchema.parse(await response.json());
      return data.models.map((m) => m.name).filter((name) => name.length > 0);
    } catch (error) {
      throw toConnectivityError(error, this.config.timeoutMs);
    }
  }

  /**
   * Check that the server answers and the configured model is installed.
   */
  async testConnection(): Promise<boolean> {
    try {
      const models = await this.listModels();
      return models.some(
        (name) => name === this.config.model || name.split(':')[0] === this.config.model
      );
    } catch (error) {
      console.warn('[LLM Client] Ollama connection test failed:', error);
      return false;
    }
  }
}

// ============================================
// Gemini Client
// ============================================

export class GeminiClient implements LLMClient {
  private config: InferenceConfig;
  private baseUrl: string;

  constructor(config: InferenceConfigInput = {}) {
    // An explicit undefined still gets the Gemini defaults
    this.config = resolveInferenceConfig({
      ...config,
      baseUrl: config.baseUrl ?? 'https://generativelanguage.googleapis.com/v1beta',
      model: config.model ?? 'gemini-2.0-flash-lite',
      provider: 'gemini',
    });
    this.baseUrl = this.config.baseUrl.replace(/\/+$/, '');
  }

  isReady(): boolean {
    return Boolean(this.config.apiKey);
  }

  getProvider(): LLMProvider {
    return 'gemini';
  }

  getModel(): string {
    return this.config.model;
  }

  async generate(prompt: string, overrides?: GenerationOverrides): Promise<LLMResponse> {
    if (!this.isReady()) {
      throw new LLMConfigError('Gemini API key not configured');
    }

    const startTime = performance.now();
    const url = `${this.baseUrl}/models/${this.config.model}:generateContent?key=${this.config.apiKey}`;

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          contents: [{ parts: [{ text: prompt }] }],
          generationConfig: {
            temperature: overrides?.temperature ?? this.config.temperature,
            maxOutputTokens: overrides?.maxTokens ?? this.config.maxTokens,
            ...(overrides?.json ? { responseMimeType: 'application/json' } : {}),
          },
        }),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });

      if (!response.ok) {
        throw await handleErrorResponse(response);
      }

      const data = GeminiResponseSchema.parse(await response.json());
      const candidate = data.candidates?.[0];

      if (candidate?.finishReason === 'SAFETY') {
        throw new LLMError('Response blocked by safety filters', undefined, false);
      }

      const text = candidate?.content?.parts[0]?.text ?? '';
      if (!text) {
        throw new LLMError('Empty response from Gemini API');
      }

      const usage = data.usageMetadata
        ? {
            promptTokens: data.usageMetadata.promptTokenCount ?? 0,
            completionTokens: data.usageMetadata.candidatesTokenCount ?? 0,
            totalTokens: data.usageMetadata.totalTokenCount ?? 0,
          }
        : undefined;

      return {
        text,
        model: this.config.model,
        generationTimeMs: performance.now() - startTime,
        usage,
      };
    } catch (error) {
      throw toConnectivityError(error, this.config.timeoutMs);
    }
  }
}

// ============================================
// Factory
// ============================================

/**
 * Create an LLM client for the configured provider.
 */
export function createLLMClient(config: InferenceConfigInput = {}): LLMClient {
  // Unresolved config, so each client applies its own provider defaults
  switch (config.provider) {
    case 'gemini':
      return new GeminiClient(config);
    case 'ollama':
    default:
      return new OllamaClient(config);
  }
}
