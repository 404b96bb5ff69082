import type { DocumentMetadata } from './profile.js';
import type { LogicalTable, SegmentationStrategy } from './table.js';
import type { ValidationReportJSON } from './validation.js';

export interface ConversionResult {
  success: boolean;
  pageTables: LogicalTable[];
  logicalTables: LogicalTable[];
  /** tables selected by the extraction mode; these are the ones validated */
  tables: LogicalTable[];
  report: ValidationReportJSON;
  metadata: DocumentMetadata;
  profile: { id: string; confidence: number } | null;
  strategy?: SegmentationStrategy;
  summary?: string;
  error?: string;
}
