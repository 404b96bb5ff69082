import type { Fragment } from '../types/fragment.js';

export function joinPageTexts(pageTexts: string[]): string {
  return pageTexts.join('\n');
}

/** Number of keywords found in each fragment's first row, summed over fragments. */
export function countHeaderKeywords(fragments: Fragment[], keywords: readonly string[]): number {
  let total = 0;
  for (const f of fragments) {
    const first = f.data?.[0];
    if (!first) continue;
    const line = first.map((c) => String(c ?? '').toUpperCase()).join(' ');
    total += keywords.filter((k) => line.includes(k)).length;
  }
  return total;
}

export function firstMatch(text: string, pattern: RegExp, group: number = 1): string | undefined {
  const m = pattern.exec(text);
  const value = m?.[group]?.trim();
  return value ? value : undefined;
}

export function clamp01(v: number): number {
  if (v <= 0) return 0;
  if (v >= 1) return 1;
  return v;
}
