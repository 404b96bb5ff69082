import type { Fragment, Row } from '../types/fragment.js';
import type { LogicalTable, TableSchema } from '../types/table.js';
import { isBlank } from '../core/cells.js';

function pageSchema(data: Row[]): TableSchema {
  const first = data[0] ?? [];
  const hasHeader = first.length > 0 && !first.some(isBlank);
  return {
    headers: hasHeader ? [...first] : first.map((_, i) => `Column_${i + 1}`),
    column_count: first.length,
    has_header: hasHeader,
    header_row_indices: hasHeader ? [0] : []
  };
}

/**
 * One table per page, in ascending page order, exactly as the page showed
 * it. Fragments sharing a page are separated by a blank row.
 */
export function createPageTables(fragments: Fragment[]): LogicalTable[] {
  const byPage = new Map<number, Row[]>();

  for (const f of fragments) {
    if (!f.data || f.data.length === 0) continue;
    const copy = f.data.map((row) => [...row]);
    const existing = byPage.get(f.page);
    if (!existing) {
      byPage.set(f.page, copy);
      continue;
    }
    existing.push(new Array<string>(f.data[0].length).fill(''));
    existing.push(...copy);
  }

  return [...byPage.entries()]
    .sort((a, b) => a[0] - b[0])
    .map(([page, data]) => ({
      data,
      schema: pageSchema(data),
      source_pages: [page],
      table_type: 'page_preserved' as const
    }));
}
