import type { Row } from './fragment.js';

export type SegmentationStrategy = 'score_domain' | 'header_repetition';

export type StrategyChoice = SegmentationStrategy | 'auto';

export type TableType = 'page_preserved' | 'logical';

export type ExtractionMode = 'hybrid' | 'page_only' | 'logical_only';

export interface ScoreDomain {
  readonly name: string;
  readonly min_score: number;
  readonly max_score: number;
  readonly description: string;
}

export interface TableSchema {
  headers: string[];
  column_count: number;
  has_header: boolean;
  header_row_indices: number[];
}

export interface LogicalTable {
  readonly data: Row[];
  readonly schema: TableSchema;
  readonly source_pages: number[];
  readonly table_type: TableType;
  readonly segmentation_strategy?: SegmentationStrategy;
  readonly section_title?: string;
  readonly score_domain?: ScoreDomain;
}
