/**
 * AI Module - Barrel Export
 *
 * Inference clients, prompt construction and response parsing.
 */

// ============================================
// LLM Client
// ============================================

export {
  createLLMClient,
  OllamaClient,
  GeminiClient,
  LLMError,
  RateLimitError,
  LLMConfigError,
  toConnectivityError,
  type LLMClient,
  type LLMProvider,
  type LLMResponse,
  type GenerationOverrides,
} from './llm-client';

// ============================================
// Prompts & Responses
// ============================================

export {
  buildStructuralPrompt,
  buildSemanticPrompt,
  buildCategorizationPrompt,
  AMOUNT_REPRESENTATIONS,
  FALLBACK_CATEGORY,
} from './prompt-builder';

export {
  parseJsonResponse,
  extractJsonPayload,
  stripCodeFence,
  type ParseResult,
} from './response-parser';
