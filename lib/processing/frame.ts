/**
 * Raw Frame Utilities
 *
 * Read-only helpers over the column-oriented RawFrame produced by file
 * parsers: row access, composite sampling and CSV serialization for prompts.
 */

import type { CellValue, RawFrame, RawRow } from '@/types/pipeline';

// ============================================
// Access
// ============================================

/**
 * Number of rows in the frame (the longest column wins).
 */
export function rowCount(frame: RawFrame): number {
  let count = 0;
  for (const column of frame.columns) {
    count = Math.max(count, frame.data[column]?.length ?? 0);
  }
  return count;
}

export function getCell(frame: RawFrame, column: string, rowIndex: number): CellValue {
  return frame.data[column]?.[rowIndex];
}

export function getRow(frame: RawFrame, rowIndex: number): RawRow {
  const row: RawRow = {};
  for (const column of frame.columns) {
    row[column] = getCell(frame, column, rowIndex);
  }
  return row;
}

/**
 * Build a frame from row-oriented records, keeping `columns` order.
 */
export function frameFromRows(columns: string[], rows: RawRow[]): RawFrame {
  const data: Record<string, CellValue[]> = {};
  for (const column of columns) {
    data[column] = rows.map((row) => row[column]);
  }
  return { columns: [...columns], data };
}

/**
 * New frame holding only the given rows, in the given order.
 */
export function selectRows(frame: RawFrame, indices: number[]): RawFrame {
  const data: Record<string, CellValue[]> = {};
  for (const column of frame.columns) {
    data[column] = indices.map((i) => getCell(frame, column, i));
  }
  return { columns: [...frame.columns], data };
}

/**
 * New frame holding only the given columns.
 */
export function selectColumns(frame: RawFrame, columns: string[]): RawFrame {
  const data: Record<string, CellValue[]> = {};
  for (const column of columns) {
    data[column] = [...(frame.data[column] ?? [])];
  }
  return { columns: [...columns], data };
}

/**
 * The header in `columns` that `name` refers to: an exact match, or else the
 * single header equal to it after trimming both. Null when there is none.
 */
export function matchColumn(name: string, columns: readonly string[]): string | null {
  if (columns.includes(name)) return name;

  const wanted = name.trim();
  if (!wanted) return null;

  const matches = columns.filter((c) => c.trim() === wanted);
  return matches.length === 1 ? (matches[0] ?? null) : null;
}

export function isBlank(value: CellValue): boolean {
  return value === null || value === undefined || String(value).trim() === '';
}

// ============================================
// Sampling
// ============================================

export interface SampleOptions {
  /** Rows taken from the head and again from the tail */
  edgeSize: number;
  /** Rows drawn at random from between head and tail */
  middleSize: number;
  seed: number;
}

/**
 * Small deterministic PRNG (mulberry32) so samples are reproducible.
 */
export function createSeededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Row indices of the composite sample: head, a seeded random slice of the
 * middle (kept in source order), and tail. Small frames are returned whole.
 */
export function sampleRowIndices(total: number, options: SampleOptions): number[] {
  const { edgeSize, middleSize, seed } = options;

  if (total <= edgeSize * 2 + middleSize) {
    return Array.from({ length: total }, (_, i) => i);
  }

  const head = Array.from({ length: edgeSize }, (_, i) => i);
  const tail = Array.from({ length: edgeSize }, (_, i) => total - edgeSize + i);

  const middlePool = Array.from(
    { length: total - edgeSize * 2 },
    (_, i) => edgeSize + i
  );
  const random = createSeededRandom(seed);

  // Partial Fisher-Yates: the first `take` slots become the sample
  const take = Math.min(middleSize, middlePool.length);
  for (let i = 0; i < take; i++) {
    const j = i + Math.floor(random() * (middlePool.length - i));
    const picked = middlePool[j];
    const current = middlePool[i];
    if (picked !== undefined && current !== undefined) {
      middlePool[i] = picked;
      middlePool[j] = current;
    }
  }
  const middle = middlePool.slice(0, take).sort((a, b) => a - b);

  return [...head, ...middle, ...tail];
}

export function createDataSample(frame: RawFrame, options: SampleOptions): RawFrame {
  return selectRows(frame, sampleRowIndices(rowCount(frame), options));
}

// ============================================
// Serialization
// ============================================

function escapeCsvValue(value: CellValue): string {
  if (value === null || value === undefined) return '';
  const text = String(value);
  if (/[",\n\r]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/**
 * Serialize a frame to CSV with a header row.
 */
export function frameToCsv(frame: RawFrame, columns: string[] = frame.columns): string {
  const lines = [columns.map(escapeCsvValue).join(',')];
  const total = rowCount(frame);

  for (let i = 0; i < total; i++) {
    lines.push(columns.map((column) => escapeCsvValue(getCell(frame, column, i))).join(','));
  }

  return lines.join('\n');
}
