export type Cell = string;

export type Row = Cell[];

/**
 * One raw table as the ingestion layer found it on a single page.
 * Fragments are never mutated once produced.
 */
export interface Fragment {
  data: Row[];
  /** 1-based page number */
  page: number;
  /** position of the table on its page */
  table_index: number;
  /** origin tag, e.g. 'pdf', 'ocr', 'docx' */
  source: string;
}

export interface MergedFragments {
  rows: Row[];
  /** contributing pages in first-seen order */
  pages: number[];
}

export type ExtractionContext = Record<string, unknown>;

export interface DocumentInput {
  fragments: Fragment[];
  /** full-page text, positionally aligned to pages */
  pageTexts?: string[];
  context?: ExtractionContext;
}
