import type { LogicalTable } from '../types/table.js';
import { DEFAULT_VALIDATION_THRESHOLDS } from '../types/config.js';

export const DISTRIBUTION_INDICATORS = ['frequency', 'percent', 'cumulative', 'score', 'mark'] as const;
export const ROSTER_INDICATORS = ['name', 'position', 'department', 'staff', 'student', 'employee'] as const;

export const COLUMN_KEYWORDS = {
  percent: ['percent', 'percentage', '%'],
  cumulative: ['cumulative', 'cum', 'cum.'],
  frequency: ['frequency', 'freq', 'f'],
  score: ['score', 'mark', 'grade']
} as const;

export type DistributionColumn = keyof typeof COLUMN_KEYWORDS;

/** Index of the first header containing any of the keywords (case-insensitive). */
export function findColumnIndex(headers: string[], keywords: readonly string[]): number | null {
  for (let i = 0; i < headers.length; i++) {
    const h = String(headers[i] ?? '').toLowerCase();
    if (keywords.some((k) => h.includes(k))) return i;
  }
  return null;
}

export function locateDistributionColumns(headers: string[]): Record<DistributionColumn, number | null> {
  return {
    percent: findColumnIndex(headers, COLUMN_KEYWORDS.percent),
    cumulative: findColumnIndex(headers, COLUMN_KEYWORDS.cumulative),
    frequency: findColumnIndex(headers, COLUMN_KEYWORDS.frequency),
    score: findColumnIndex(headers, COLUMN_KEYWORDS.score)
  };
}

function headersLower(table: LogicalTable): string[] {
  return table.schema.headers.map((h) => String(h ?? '').toLowerCase());
}

export function isDistributionTable(
  table: LogicalTable,
  minKeywords: number = DEFAULT_VALIDATION_THRESHOLDS.distributionKeywordMin
): boolean {
  if (table.data.length === 0) return false;
  const headers = headersLower(table);
  const matches = DISTRIBUTION_INDICATORS.filter((k) => headers.some((h) => h.includes(k))).length;
  return matches >= minKeywords;
}

export function isRosterTable(table: LogicalTable): boolean {
  if (table.data.length === 0) return false;
  const headers = headersLower(table);
  return ROSTER_INDICATORS.some((k) => headers.some((h) => h.includes(k)));
}
