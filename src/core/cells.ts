import type { Fragment, MergedFragments, Row } from '../types/fragment.js';

const NUMERIC_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Reads a cell as a number. Thousands separators are dropped and, when
 * asked, a percent sign too. Anything else that is not a plain decimal
 * literal is "not numeric" and yields null.
 */
export function parseNumber(value: unknown, options?: { stripPercent?: boolean }): number | null {
  if (value === null || value === undefined) return null;
  let s = String(value).split(',').join('');
  if (options?.stripPercent) s = s.split('%').join('');
  s = s.trim();
  if (!NUMERIC_PATTERN.test(s)) return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

export function isNumeric(value: unknown): boolean {
  return parseNumber(value) !== null;
}

export function isBlank(cell: unknown): boolean {
  return String(cell ?? '').trim().length === 0;
}

export function nonBlankCells(row: Row): string[] {
  return row.filter((c) => !isBlank(c));
}

/** Trim + uppercase every cell; used to compare header rows. */
export function normalizeRow(row: Row): string[] {
  return row.map((c) => String(c ?? '').trim().toUpperCase());
}

export function rowKey(row: Row): string {
  return JSON.stringify(normalizeRow(row));
}

/**
 * Concatenates every fragment's rows in fragment order. Page boundaries are
 * discarded; only the set of contributing pages survives.
 */
export function mergeFragments(fragments: Fragment[]): MergedFragments {
  const rows: Row[] = [];
  const pages: number[] = [];

  for (const f of fragments) {
    if (!f.data || f.data.length === 0) continue;
    rows.push(...f.data);
    if (!pages.includes(f.page)) pages.push(f.page);
  }

  return { rows, pages };
}
