export { TableSegmenter, segmentTables, type TableSegmenterOptions } from './segmenter.js';
export { segmentByScoreDomain, type ScoreDomainSegmenterOptions } from './score-domain-segmenter.js';
export {
  segmentByHeaderRepetition,
  detectHeaderPattern,
  matchesHeader,
  sectionTitleOf,
  type HeaderRepetitionSegmenterOptions
} from './header-repetition-segmenter.js';
export { createPageTables } from './page-tables.js';
export { RoutedTables } from './routed-tables.js';
export { createLogicalTable, headerSchema } from './table-builder.js';
