import type { Fragment, Row } from '../types/fragment.js';
import type { LogicalTable } from '../types/table.js';
import { DEFAULT_SEGMENTATION_THRESHOLDS } from '../types/config.js';
import { isBlank, mergeFragments, nonBlankCells, normalizeRow, rowKey } from '../core/cells.js';
import { createDebugLogger } from '../utils/debug.js';
import { createLogicalTable, headerSchema } from './table-builder.js';

const debug = createDebugLogger('header-repetition');

export type HeaderRepetitionSegmenterOptions = {
  minHeaderRepeats?: number;
};

/**
 * First fully populated row (normalized) that occurs at least `minRepeats`
 * times, in first-seen order.
 */
export function detectHeaderPattern(
  rows: Row[],
  minRepeats: number = DEFAULT_SEGMENTATION_THRESHOLDS.minHeaderRepeats
): string[] | null {
  const counts = new Map<string, { cells: string[]; count: number }>();

  for (const row of rows) {
    if (row.length === 0 || row.some(isBlank)) continue;
    const key = rowKey(row);
    const entry = counts.get(key);
    if (entry) {
      entry.count++;
    } else {
      counts.set(key, { cells: normalizeRow(row), count: 1 });
    }
  }

  for (const entry of counts.values()) {
    if (entry.count >= minRepeats) return entry.cells;
  }
  return null;
}

export function matchesHeader(row: Row, pattern: string[]): boolean {
  if (row.length !== pattern.length) return false;
  const normalized = normalizeRow(row);
  return normalized.every((cell, i) => cell === pattern[i]);
}

/** Returns the title text when the row has one filled cell out of two or more. */
export function sectionTitleOf(row: Row): string | null {
  if (row.length < 2) return null;
  const filled = nonBlankCells(row);
  return filled.length === 1 ? filled[0].trim() : null;
}

function singleTable(rows: Row[], pages: number[]): LogicalTable[] {
  return [
    {
      data: rows.map((row) => [...row]),
      schema: headerSchema(rows[0]),
      source_pages: [...pages],
      table_type: 'logical',
      segmentation_strategy: 'header_repetition'
    }
  ];
}

/**
 * Merges every fragment and cuts the result wherever the repeating header
 * row comes back. Single-cell rows in between label the section being
 * accumulated.
 */
export function segmentByHeaderRepetition(
  fragments: Fragment[],
  options: HeaderRepetitionSegmenterOptions = {}
): LogicalTable[] {
  const { rows, pages } = mergeFragments(fragments);
  if (rows.length === 0) return [];

  const pattern = detectHeaderPattern(rows, options.minHeaderRepeats);
  if (!pattern) {
    debug('no repeating header; emitting one table');
    return singleTable(rows, pages);
  }
  debug('header pattern', pattern);

  const tables: LogicalTable[] = [];
  let currentHeader: Row | null = null;
  let section: Row[] = [];
  let pendingTitle: string | undefined;

  const flush = () => {
    if (!currentHeader || section.length === 0) return;
    tables.push(
      createLogicalTable(currentHeader, section, pages, {
        strategy: 'header_repetition',
        sectionTitle: pendingTitle
      })
    );
  };

  for (const row of rows) {
    if (row.length === 0) continue;

    if (matchesHeader(row, pattern)) {
      flush();
      currentHeader = row;
      section = [];
      pendingTitle = undefined;
      continue;
    }

    const title = sectionTitleOf(row);
    if (title !== null) {
      pendingTitle = title;
      continue;
    }

    // rows ahead of the first header have nowhere to go
    if (currentHeader) section.push(row);
  }
  flush();

  if (tables.length === 0) {
    debug('header pattern never framed a section; emitting one table');
    return singleTable(rows, pages);
  }
  return tables;
}
