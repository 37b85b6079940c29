/**
 * LLM Response Parsing
 *
 * Models frequently wrap JSON in markdown fences or add a sentence before
 * it. These helpers recover the JSON payload and validate it with zod.
 */

import type { z } from 'zod';

/**
 * Result of parsing a model response.
 */
export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };

/**
 * Remove a surrounding ```json / ``` fence, if present.
 */
export function stripCodeFence(text: string): string {
  let cleaned = text.trim();

  const fenced = cleaned.match(/^```(?:json|JSON)?\s*\n?([\s\S]*?)\n?```\s*$/);
  if (fenced?.[1] !== undefined) {
    cleaned = fenced[1];
  }

  return cleaned.trim();
}

/**
 * Find the outermost JSON object or array in free text.
 * Returns the input unchanged when no bracket pair is found.
 */
export function extractJsonPayload(text: string): string {
  const cleaned = stripCodeFence(text);
  if (cleaned.startsWith('{') || cleaned.startsWith('[')) {
    return cleaned;
  }

  const firstObject = cleaned.indexOf('{');
  const firstArray = cleaned.indexOf('[');
  const starts = [firstObject, firstArray].filter((i) => i >= 0);
  if (starts.length === 0) {
    return cleaned;
  }

  const start = Math.min(...starts);
  const closing = cleaned[start] === '[' ? ']' : '}';
  const end = cleaned.lastIndexOf(closing);

  return end > start ? cleaned.slice(start, end + 1) : cleaned;
}

/**
 * Parse a model response as JSON and validate it against a schema.
 */
export function parseJsonResponse<S extends z.ZodTypeAny>(
  text: string,
  schema: S
): ParseResult<z.output<S>> {
  let raw: unknown;
  try {
    raw = JSON.parse(extractJsonPayload(text));
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    return { success: false, error: `Invalid JSON: ${detail}` };
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return { success: false, error: `Schema mismatch: ${issues}` };
  }

  return { success: true, data: parsed.data };
}
