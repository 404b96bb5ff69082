import type { Row } from '../types/fragment.js';
import type { LogicalTable, ScoreDomain, SegmentationStrategy, TableSchema } from '../types/table.js';

export function headerSchema(header: Row): TableSchema {
  return {
    headers: [...header],
    column_count: header.length,
    has_header: true,
    header_row_indices: [0]
  };
}

export type LogicalTableExtras = {
  strategy?: SegmentationStrategy;
  sectionTitle?: string;
  scoreDomain?: ScoreDomain;
};

/** `data` becomes header followed by body; rows are copied. */
export function createLogicalTable(
  header: Row,
  body: Row[],
  pages: number[],
  extras: LogicalTableExtras = {}
): LogicalTable {
  return {
    data: [[...header], ...body.map((row) => [...row])],
    schema: headerSchema(header),
    source_pages: [...pages],
    table_type: 'logical',
    segmentation_strategy: extras.strategy,
    section_title: extras.sectionTitle,
    score_domain: extras.scoreDomain
  };
}
