import type { ExtractionContext, Fragment } from '../types/fragment.js';
import type { DocumentMetadata, DocumentProfile, ProfileDetection } from '../types/profile.js';
import type { LogicalTable, ScoreDomain, SegmentationStrategy } from '../types/table.js';
import { detectHeaderPattern } from '../segmentation/header-repetition-segmenter.js';
import { clamp01, countHeaderKeywords, firstMatch, joinPageTexts } from './text.js';

const ROSTER_HEADER_KEYWORDS = ['NAME', 'POSITION', 'DEPARTMENT', 'NATIONALITY'] as const;
const YEAR_PATTERN = /\b(20\d{2})\b/;

export type StaffRosterProfileOptions = {
  indicators?: string[];
};

/** Personnel rosters: a header row repeated on every page, departments as section titles. */
export class StaffRosterProfile implements DocumentProfile {
  readonly id = 'staff-roster';
  readonly version = '1.0.0';

  private indicators: string[];

  constructor(options: StaffRosterProfileOptions = {}) {
    this.indicators = (options.indicators ?? [
      'STAFF LIST',
      'STAFF ROSTER',
      'INTERNATIONAL STAFF',
      'PERSONNEL'
    ]).map((s) => s.toUpperCase());
  }

  detect(fragments: Fragment[], pageTexts: string[], _context: ExtractionContext): ProfileDetection {
    const text = joinPageTexts(pageTexts).toUpperCase();
    const metadata: Record<string, unknown> = {};
    let confidence = 0;

    const indicatorHits = this.indicators.filter((ind) => text.includes(ind)).length;
    if (indicatorHits > 0) confidence += 0.3 * Math.min(indicatorHits, 2);

    if (countHeaderKeywords(fragments, ROSTER_HEADER_KEYWORDS) >= 2) confidence += 0.3;

    const pattern = detectHeaderPattern(fragments.flatMap((f) => f.data ?? []));
    if (pattern) {
      confidence += 0.4;
      metadata.header_pattern = pattern;
    }

    const year = firstMatch(text, YEAR_PATTERN);
    if (year) metadata.year = year;

    return { profileId: this.id, confidence: clamp01(confidence), metadata };
  }

  segmentationStrategy(): SegmentationStrategy {
    return 'header_repetition';
  }

  scoreDomains(): ScoreDomain[] | undefined {
    return undefined;
  }

  extractMetadata(_fragments: Fragment[], pageTexts: string[], _context: ExtractionContext): DocumentMetadata {
    const text = joinPageTexts(pageTexts);

    return {
      title: firstMatch(text, /([^\n]*STAFF\s+(?:LIST|ROSTER)[^\n]*)/i) ?? 'Staff List',
      organization: firstMatch(text, /(?:SCHOOL|COLLEGE|UNIVERSITY|ORGANI[SZ]ATION)[:\s]+([^\n]+)/i),
      reporting_period: firstMatch(text, YEAR_PATTERN),
      profile_id: this.id,
      profile_version: this.version,
      profile_confidence: 0,
      validation_issues_count: 0
    };
  }

  summarize(tables: LogicalTable[]): string | undefined {
    if (tables.length === 0) return undefined;

    let total = 0;
    const lines = tables.map((t) => {
      const count = t.data.length - 1;
      total += count;
      return `- ${t.section_title ?? 'General'}: ${count} staff members`;
    });

    return `Staff List Summary:\nTotal Staff: ${total}\n\nBy Section:\n${lines.join('\n')}`;
  }
}
