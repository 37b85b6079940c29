/**
 * Date Format Translation
 *
 * The structural pass reports date formats as strftime directives
 * (`%d/%m/%Y`). Parsing is done with date-fns, so directives are
 * translated into date-fns tokens and literal text is quoted.
 */

import { format, isValid, parse } from 'date-fns';

import type { CellValue } from '@/types/pipeline';

// ============================================
// Directive Table
// ============================================

/**
 * strftime directive → date-fns token.
 * Numeric day/month/hour tokens use the single-letter forms, which accept
 * one or two digits the way strptime does.
 */
const DIRECTIVES: Record<string, string> = {
  Y: 'yyyy',
  y: 'yy',
  m: 'M',
  d: 'd',
  e: 'd',
  b: 'MMM',
  h: 'MMM',
  B: 'MMMM',
  a: 'EEE',
  A: 'EEEE',
  H: 'H',
  I: 'h',
  M: 'm',
  S: 's',
  p: 'a',
  z: 'xx',
};

/**
 * Translate a strftime format into a date-fns pattern.
 * Returns null when the format uses a directive we cannot parse.
 */
export function strftimeToDateFns(strftime: string): string | null {
  let pattern = '';
  let literal = '';

  const flushLiteral = () => {
    if (!literal) return;
    // date-fns treats every ASCII letter as a token, so letters must be quoted
    pattern += /[A-Za-z']/.test(literal) ? `'${literal.replace(/'/g, "''")}'` : literal;
    literal = '';
  };

  for (let i = 0; i < strftime.length; i++) {
    const char = strftime[i];
    if (char !== '%') {
      literal += char;
      continue;
    }

    const directive = strftime[i + 1];
    i++;

    if (directive === '%') {
      literal += '%';
      continue;
    }

    // Platform padding modifiers (%-d, %#d) change nothing when parsing
    if (directive === '-' || directive === '#') {
      const next = strftime[i + 1];
      i++;
      const token = next !== undefined ? DIRECTIVES[next] : undefined;
      if (!token) return null;
      flushLiteral();
      pattern += token;
      continue;
    }

    const token = directive !== undefined ? DIRECTIVES[directive] : undefined;
    if (!token) return null;

    flushLiteral();
    pattern += token;
  }

  flushLiteral();
  return pattern || null;
}

// ============================================
// Parsing
// ============================================

const REFERENCE_DATE = new Date(2000, 0, 1);

/**
 * Parse a cell with a strftime format.
 * Returns the ISO calendar date (YYYY-MM-DD) or null when the value does
 * not match the format or is not a real calendar date.
 */
export function parseDateWithFormat(value: CellValue, strftime: string): string | null {
  if (value === null || value === undefined) return null;

  const text = String(value).trim();
  if (!text) return null;

  const pattern = strftimeToDateFns(strftime);
  if (!pattern) return null;

  const parsed = parse(text, pattern, REFERENCE_DATE);
  if (!isValid(parsed)) return null;

  return format(parsed, 'yyyy-MM-dd');
}

/**
 * Whether a YYYY-MM-DD string names a real calendar date.
 */
export function isIsoCalendarDate(value: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return false;
  return isValid(parse(value, 'yyyy-MM-dd', REFERENCE_DATE));
}
