import type { Fragment, LogicalTable, Row, ScoreDomain } from '../src/index.js';
import { headerSchema } from '../src/index.js';

export function fragment(page: number, data: Row[], tableIndex: number = 0): Fragment {
  return { page, data, table_index: tableIndex, source: 'test' };
}

export function table(headers: string[], rows: Row[], scoreDomain?: ScoreDomain): LogicalTable {
  return {
    data: [headers, ...rows],
    schema: headerSchema(headers),
    source_pages: [1],
    table_type: 'logical',
    score_domain: scoreDomain
  };
}

export const FIXED_TIME = new Date('2024-05-06T07:08:09.000Z');
export const fixedClock = (): Date => FIXED_TIME;
