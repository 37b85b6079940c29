/**
 * Amount Parsing
 *
 * Turns statement amount cells into signed numbers. Handles currency
 * symbols and codes, Western and Indian thousands separators,
 * parenthesized negatives, leading or trailing minus, and CR/DR suffixes.
 */

import type { CellValue } from '@/types/pipeline';

// ============================================
// Patterns
// ============================================

/** Currency symbols and ISO codes that may prefix or suffix an amount */
const CURRENCY_PATTERN = /(?:[$€£¥₹]|\bRs\.?|\bINR\b|\bUSD\b|\bEUR\b|\bGBP\b)/gi;

/** Trailing CR/DR marker, optionally dotted ("Cr.", "DR") */
const SUFFIX_PATTERN = /\s*(?<![A-Za-z])(CR|DR)\.?\s*$/i;

const NUMBER_PATTERN = /^(?:\d+(?:\.\d*)?|\.\d+)$/;

/** 1,234,567.89 */
const WESTERN_GROUPING = /^\d{1,3}(?:,\d{3})+(?:\.\d*)?$/;

/** 12,34,567.89 */
const INDIAN_GROUPING = /^\d{1,2}(?:,\d{2})*,\d{3}(?:\.\d*)?$/;

// ============================================
// Helpers
// ============================================

/**
 * Round to cents, normalizing -0 to 0.
 */
export function roundAmount(value: number): number {
  const rounded = Math.round(value * 100) / 100;
  return rounded === 0 ? 0 : rounded;
}

function parseAmountString(raw: string): number | null {
  let text = raw.trim();
  if (!text) return null;

  let negative = false;

  const suffix = text.match(SUFFIX_PATTERN);
  if (suffix?.[1]) {
    negative = suffix[1].toUpperCase() === 'DR';
    text = text.slice(0, suffix.index).trim();
  }

  text = text.replace(CURRENCY_PATTERN, '').replace(/\s+/g, '');

  if (text.startsWith('(') && text.endsWith(')')) {
    negative = true;
    text = text.slice(1, -1);
  }

  if (text.startsWith('-')) {
    negative = true;
    text = text.slice(1);
  } else if (text.startsWith('+')) {
    text = text.slice(1);
  } else if (text.endsWith('-')) {
    negative = true;
    text = text.slice(0, -1);
  }

  // Currency may sit inside the sign: -$1,234.56 or ($25.00)
  text = text.replace(CURRENCY_PATTERN, '');

  // Commas only as thousands separators; "12,50" is not 1250
  if (text.includes(',')) {
    if (!WESTERN_GROUPING.test(text) && !INDIAN_GROUPING.test(text)) return null;
    text = text.replace(/,/g, '');
  }

  if (!NUMBER_PATTERN.test(text)) return null;

  const magnitude = parseFloat(text);
  if (!Number.isFinite(magnitude)) return null;

  return roundAmount(negative ? -magnitude : magnitude);
}

// ============================================
// Public API
// ============================================

/**
 * Parse an amount cell.
 * Returns null for blank or unparseable values; use `isBlank` to tell
 * the two apart.
 */
export function parseAmount(value: CellValue): number | null {
  if (value === null || value === undefined) return null;

  if (typeof value === 'number') {
    return Number.isFinite(value) ? roundAmount(value) : null;
  }

  return parseAmountString(value);
}
