/**
 * Unit Tests for the LLM Clients
 *
 * fetch is replaced per test with vi.stubGlobal; nothing leaves the process.
 */

import { describe, it, expect, vi } from 'vitest';

import { ConnectivityError } from '@/lib/errors';

import {
  createLLMClient,
  GeminiClient,
  LLMConfigError,
  LLMError,
  OllamaClient,
  RateLimitError,
} from './llm-client';

// ============================================
// Test Helpers
// ============================================

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
    ...init,
  });
}

function stubFetch(response: Response | Error) {
  const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => {
    if (response instanceof Error) throw response;
    return response;
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function requestBody(init: RequestInit | undefined): unknown {
  return typeof init?.body === 'string' ? JSON.parse(init.body) : null;
}

// ============================================
// Ollama
// ============================================

describe('OllamaClient', () => {
  it('should post to /api/generate and return the text', async () => {
    const fetchMock = stubFetch(
      jsonResponse({ response: '{"ok": true}', model: 'llama3.1', prompt_eval_count: 10, eval_count: 5 })
    );
    const client = new OllamaClient({ baseUrl: 'http://ollama.test/', model: 'llama3.1' });

    const result = await client.generate('hello', { json: true });

    expect(result.text).toBe('{"ok": true}');
    expect(result.usage).toEqual({ promptTokens: 10, completionTokens: 5, totalTokens: 15 });

    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://ollama.test/api/generate');
    expect(requestBody(fetchMock.mock.calls[0]?.[1])).toMatchObject({
      model: 'llama3.1',
      prompt: 'hello',
      stream: false,
      format: 'json',
    });
  });

  it('should omit the json format when not requested', async () => {
    const fetchMock = stubFetch(jsonResponse({ response: 'plain' }));

    await new OllamaClient().generate('hello');

    const body = requestBody(fetchMock.mock.calls[0]?.[1]);
    expect(body).not.toHaveProperty('format');
  });

  it('should map a refused connection to ConnectivityError', async () => {
    stubFetch(new TypeError('fetch failed'));

    const error = await new OllamaClient().generate('hello').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConnectivityError);
    if (error instanceof ConnectivityError) {
      expect(error.reason).toBe('connection_refused');
      expect(error.recoverable).toBe(true);
    }
  });

  it('should map a timeout to ConnectivityError', async () => {
    const timeout = new Error('The operation was aborted due to timeout');
    timeout.name = 'TimeoutError';
    stubFetch(timeout);

    const error = await new OllamaClient({ timeoutMs: 250 }).generate('hello').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConnectivityError);
    if (error instanceof ConnectivityError) {
      expect(error.reason).toBe('timeout');
      expect(error.message).toBe('Inference request timed out after 250ms');
    }
  });

  it('should map HTTP status codes', async () => {
    stubFetch(jsonResponse({ error: 'slow down' }, { status: 429, headers: { 'Retry-After': '2' } }));
    const rateLimited = await new OllamaClient().generate('x').catch((e: unknown) => e);
    expect(rateLimited).toBeInstanceOf(RateLimitError);
    if (rateLimited instanceof RateLimitError) {
      expect(rateLimited.retryAfterMs).toBe(2000);
      expect(rateLimited.message).toBe('slow down');
    }

    stubFetch(jsonResponse({ error: 'model "nope" not found' }, { status: 404 }));
    await expect(new OllamaClient().generate('x')).rejects.toBeInstanceOf(LLMConfigError);

    stubFetch(jsonResponse({}, { status: 503 }));
    const unavailable = await new OllamaClient().generate('x').catch((e: unknown) => e);
    expect(unavailable).toBeInstanceOf(LLMError);
    if (unavailable instanceof LLMError) {
      expect(unavailable.statusCode).toBe(503);
      expect(unavailable.recoverable).toBe(true);
    }
  });

  it('should report whether the configured model is installed', async () => {
    stubFetch(jsonResponse({ models: [{ name: 'llama3.1:latest' }, { name: 'mistral:7b' }] }));

    await expect(new OllamaClient({ model: 'llama3.1' }).testConnection()).resolves.toBe(true);
  });

  it('should report a failed connection test as false', async () => {
    await expect(new OllamaClient().testConnection()).resolves.toBe(false);
  });
});

// ============================================
// Gemini
// ============================================

describe('GeminiClient', () => {
  it('should refuse to run without an API key', async () => {
    const client = new GeminiClient();

    expect(client.isReady()).toBe(false);
    await expect(client.generate('hello')).rejects.toBeInstanceOf(LLMConfigError);
  });

  it('should call generateContent and return the first candidate', async () => {
    const fetchMock = stubFetch(
      jsonResponse({
        candidates: [{ content: { parts: [{ text: '[]' }] }, finishReason: 'STOP' }],
        usageMetadata: { promptTokenCount: 3, candidatesTokenCount: 1, totalTokenCount: 4 },
      })
    );
    const client = new GeminiClient({ apiKey: 'test-key' });

    const result = await client.generate('hello', { json: true });

    expect(result.text).toBe('[]');
    expect(result.usage?.totalTokens).toBe(4);
    expect(fetchMock.mock.calls[0]?.[0]).toBe(
      'https://generativelanguage.googleapis.com/v1beta/models/gemini-2.0-flash-lite:generateContent?key=test-key'
    );
    expect(requestBody(fetchMock.mock.calls[0]?.[1])).toMatchObject({
      generationConfig: { responseMimeType: 'application/json' },
    });
  });

  it('should reject responses blocked by safety filters', async () => {
    stubFetch(jsonResponse({ candidates: [{ finishReason: 'SAFETY' }] }));

    await expect(new GeminiClient({ apiKey: 'test-key' }).generate('x')).rejects.toThrow(
      'Response blocked by safety filters'
    );
  });
});

// ============================================
// Factory
// ============================================

describe('createLLMClient', () => {
  it('should default to Ollama', () => {
    const client = createLLMClient();

    expect(client.getProvider()).toBe('ollama');
    expect(client.getModel()).toBe('llama3.1');
  });

  it('should build a Gemini client with its own defaults', () => {
    const client = createLLMClient({ provider: 'gemini', apiKey: 'test-key' });

    expect(client.getProvider()).toBe('gemini');
    expect(client.getModel()).toBe('gemini-2.0-flash-lite');
    expect(client.isReady()).toBe(true);
  });

  it('should keep the Gemini defaults when keys are explicitly undefined', async () => {
    const fetchMock = stubFetch(
      jsonResponse({ candidates: [{ content: { parts: [{ text: 'ok' }] }, finishReason: 'STOP' }] })
    );
    const client = createLLMClient({
      provider: 'gemini',
      apiKey: 'test-key',
      baseUrl: undefined,
      model: undefined,
    });

    await client.generate('hello');

    expect(client.getModel()).toBe('gemini-2.0-flash-lite');
    expect(fetchMock.mock.calls[0]?.[0]).toBe(
      'https://generativelanguage.googleapis.com/v1beta/models/gemini-2.0-flash-lite:generateContent?key=test-key'
    );
  });
});
