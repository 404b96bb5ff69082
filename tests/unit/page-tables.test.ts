import { describe, it, expect } from 'vitest';
import { createPageTables } from '../../src/segmentation/page-tables.js';
import { RoutedTables } from '../../src/segmentation/routed-tables.js';
import { segmentByScoreDomain } from '../../src/segmentation/score-domain-segmenter.js';
import { fragment } from '../fixtures.js';

describe('createPageTables', () => {
  it('should emit one table per page in page order', () => {
    const tables = createPageTables([
      fragment(2, [['A', 'B'], ['1', '2']]),
      fragment(1, [['Name', 'Age'], ['x', '1']]),
      fragment(1, [['c', 'd', 'e']], 1)
    ]);

    expect(tables.map((t) => t.source_pages)).toEqual([[1], [2]]);
    expect(tables[0].data).toEqual([['Name', 'Age'], ['x', '1'], ['', '', ''], ['c', 'd', 'e']]);
    expect(tables[0].schema).toEqual({
      headers: ['Name', 'Age'],
      column_count: 2,
      has_header: true,
      header_row_indices: [0]
    });
    expect(tables[1].table_type).toBe('page_preserved');
  });

  it('should fall back to positional headers when the first row has gaps', () => {
    const [table] = createPageTables([fragment(1, [['Total', ''], ['1', '2']])]);
    expect(table.schema).toEqual({
      headers: ['Column_1', 'Column_2'],
      column_count: 2,
      has_header: false,
      header_row_indices: []
    });
  });

  it('should not share rows with the input', () => {
    const source = fragment(1, [['Name', 'Age']]);
    const [table] = createPageTables([source]);
    table.data[0][0] = 'changed';
    expect(source.data[0][0]).toBe('Name');
  });
});

describe('RoutedTables', () => {
  const fragments = [fragment(1, [['Score', 'Freq'], ['1', '2']]), fragment(2, [['3', '4']])];
  const routed = new RoutedTables(createPageTables(fragments), segmentByScoreDomain(fragments));

  it('should return page tables first in hybrid mode', () => {
    expect(routed.getAllTables('hybrid').map((t) => t.table_type)).toEqual([
      'page_preserved',
      'page_preserved',
      'logical'
    ]);
  });

  it('should select one kind per exclusive mode', () => {
    expect(routed.getAllTables('page_only')).toHaveLength(2);
    expect(routed.getAllTables('logical_only').map((t) => t.table_type)).toEqual(['logical']);
  });
});
