import type { ExtractionContext, Fragment } from './fragment.js';
import type { LogicalTable, ScoreDomain, SegmentationStrategy } from './table.js';

export interface ProfileDetection {
  profileId: string;
  /** 0..1 */
  confidence: number;
  metadata: Record<string, unknown>;
}

export interface DocumentMetadata {
  title?: string;
  organization?: string;
  reporting_period?: string;
  subject_or_code?: string;
  profile_id?: string;
  profile_version?: string;
  profile_confidence: number;
  validation_status?: string;
  validation_issues_count: number;
}

/**
 * A recognizer for a known document type. It decides how confident it is
 * that a document belongs to it and, if chosen, how the document should be
 * segmented.
 */
export interface DocumentProfile {
  readonly id: string;
  readonly version: string;

  detect(fragments: Fragment[], pageTexts: string[], context: ExtractionContext): ProfileDetection;
  segmentationStrategy(): SegmentationStrategy;
  scoreDomains(): ScoreDomain[] | undefined;
  extractMetadata(fragments: Fragment[], pageTexts: string[], context: ExtractionContext): DocumentMetadata;

  postProcessTables?(tables: LogicalTable[]): LogicalTable[];
  summarize?(tables: LogicalTable[]): string | undefined;
}

export interface ProfileMatch {
  profile: DocumentProfile;
  detection: ProfileDetection;
}
