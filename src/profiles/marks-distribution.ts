import type { ExtractionContext, Fragment } from '../types/fragment.js';
import type { DocumentMetadata, DocumentProfile, ProfileDetection } from '../types/profile.js';
import type { LogicalTable, ScoreDomain, SegmentationStrategy } from '../types/table.js';
import { DEFAULT_SEGMENTATION_THRESHOLDS } from '../types/config.js';
import { createScoreDomain } from '../core/score-domains.js';
import { numericFirstColumnShare } from '../core/strategy-detector.js';
import { clamp01, countHeaderKeywords, firstMatch, joinPageTexts } from './text.js';

export const MARKS_DISTRIBUTION_DOMAINS: readonly ScoreDomain[] = Object.freeze([
  createScoreDomain('Scaled_Objective', 0, 19, 'Scaled Objective score range (0-19)'),
  createScoreDomain('Scaled_Essay', 15, 40, 'Scaled Essay score range (15-40)'),
  createScoreDomain('Raw_Score_40', 0, 40, 'Raw score range (0-40)'),
  createScoreDomain('Raw_Score_50', 0, 50, 'Raw score range (0-50)'),
  createScoreDomain('Raw_Score_60', 0, 60, 'Raw score range (0-60)')
]);

const DISTRIBUTION_HEADER_KEYWORDS = ['FREQUENCY', 'PERCENT', 'CUMULATIVE', 'SCORE'] as const;

const SUBJECT_PATTERN = /SUBJECT[:\s]+([A-Z][A-Z ]*?)(?:\s{2,}|\n|$)/m;
const SESSION_PATTERN = /(?:SESSION|YEAR)[:\s]+(\d{4})/;

export type MarksDistributionProfileOptions = {
  /** phrases in the page text that point at an examination body's report */
  indicators?: string[];
  domains?: ScoreDomain[];
  numericRatio?: number;
};

/**
 * Score distribution reports: Score / Frequency / Percent / Cumulative
 * tables whose score ranges routinely run across page breaks.
 */
export class MarksDistributionProfile implements DocumentProfile {
  readonly id = 'marks-distribution';
  readonly version = '1.0.0';

  private indicators: string[];
  private domains: ScoreDomain[];
  private numericRatio: number;

  constructor(options: MarksDistributionProfileOptions = {}) {
    this.indicators = (options.indicators ?? [
      'EXAMINATIONS COUNCIL',
      'MARKS DISTRIBUTION',
      'SCORE DISTRIBUTION',
      'TASS',
      'CASS'
    ]).map((s) => s.toUpperCase());
    this.domains = options.domains ? [...options.domains] : [...MARKS_DISTRIBUTION_DOMAINS];
    this.numericRatio = options.numericRatio ?? DEFAULT_SEGMENTATION_THRESHOLDS.numericRatio;
  }

  detect(fragments: Fragment[], pageTexts: string[], _context: ExtractionContext): ProfileDetection {
    const text = joinPageTexts(pageTexts).toUpperCase();
    const metadata: Record<string, unknown> = {};
    let confidence = 0;

    const indicatorHits = this.indicators.filter((ind) => text.includes(ind)).length;
    if (indicatorHits > 0) confidence += 0.3 * Math.min(indicatorHits, 2);

    if (countHeaderKeywords(fragments, DISTRIBUTION_HEADER_KEYWORDS) >= 3) confidence += 0.4;

    const scoreColumn = fragments.some((f) => {
      const share = numericFirstColumnShare(f);
      return share !== null && share >= this.numericRatio;
    });
    if (scoreColumn) confidence += 0.3;

    const subject = firstMatch(text, SUBJECT_PATTERN);
    if (subject) metadata.subject = subject;
    const session = firstMatch(text, SESSION_PATTERN);
    if (session) metadata.session = session;
    if (text.includes('ESSAY')) metadata.paper_type = 'essay';
    else if (text.includes('OBJECTIVE')) metadata.paper_type = 'objective';

    return { profileId: this.id, confidence: clamp01(confidence), metadata };
  }

  segmentationStrategy(): SegmentationStrategy {
    return 'score_domain';
  }

  scoreDomains(): ScoreDomain[] {
    return [...this.domains];
  }

  extractMetadata(_fragments: Fragment[], pageTexts: string[], _context: ExtractionContext): DocumentMetadata {
    const text = joinPageTexts(pageTexts);
    const upper = text.toUpperCase();

    return {
      title: firstMatch(text, /^\s*([^\n]*(?:DISTRIBUTION|STATISTICS)[^\n]*)$/im) ?? 'Marks Distribution',
      organization: firstMatch(text, /^\s*([^\n]*EXAMINATIONS?\s+(?:COUNCIL|BOARD)[^\n]*)$/im),
      reporting_period: firstMatch(upper, SESSION_PATTERN),
      subject_or_code: firstMatch(upper, SUBJECT_PATTERN),
      profile_id: this.id,
      profile_version: this.version,
      profile_confidence: 0,
      validation_issues_count: 0
    };
  }

  summarize(tables: LogicalTable[]): string | undefined {
    const lines = tables
      .filter((t) => t.score_domain)
      .map((t) => `- ${t.score_domain?.name}: ${t.data.length - 1} score entries`);
    return lines.length > 0 ? `Marks Distribution Summary:\n${lines.join('\n')}` : undefined;
  }
}
