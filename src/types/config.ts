import type { ExtractionMode, ScoreDomain, StrategyChoice } from './table.js';

export interface SegmentationThresholds {
  /** share of numeric first-column values that marks a score table */
  numericRatio: number;
  /** sorted-value gap that splits auto-detected score domains */
  domainGap: number;
  /** occurrences needed before a row counts as a repeating header */
  minHeaderRepeats: number;
}

export interface ValidationThresholds {
  /** percent totals may deviate from 100 by tolerance * 100 */
  tolerance: number;
  /** header keywords required to treat a table as a distribution */
  distributionKeywordMin: number;
}

export interface TableStitcherConfig {
  // Routing
  mode: ExtractionMode;
  strategy?: StrategyChoice;
  scoreDomains?: ScoreDomain[];

  // Validation
  validationEnabled: boolean;
  validationTolerance?: number;

  // Profiles
  minProfileConfidence?: number;

  // Heuristics
  thresholds?: Partial<SegmentationThresholds & Pick<ValidationThresholds, 'distributionKeywordMin'>>;

  // Reproducible timestamps
  clock?: () => Date;
}

export const DEFAULT_SEGMENTATION_THRESHOLDS: Readonly<SegmentationThresholds> = {
  numericRatio: 0.7,
  domainGap: 5,
  minHeaderRepeats: 2
};

export const DEFAULT_VALIDATION_THRESHOLDS: Readonly<ValidationThresholds> = {
  tolerance: 0.01,
  distributionKeywordMin: 2
};

export const DEFAULT_MIN_PROFILE_CONFIDENCE = 0.5;

// Chainable configuration interface
export interface ChainableTableStitcher {
  setMode(mode: ExtractionMode): ChainableTableStitcher;
  setStrategy(strategy: StrategyChoice): ChainableTableStitcher;
  setScoreDomains(domains: ScoreDomain[] | undefined): ChainableTableStitcher;
  setTolerance(tolerance: number): ChainableTableStitcher;
  enableValidation(enabled?: boolean): ChainableTableStitcher;
  applyPreset(preset: 'distribution' | 'roster' | 'strict'): ChainableTableStitcher;
}

export interface ConversionProgress {
  stage: 'profiling' | 'segmenting' | 'validating' | 'complete';
  progress: number;
  message?: string;
}

export type ProgressCallback = (progress: ConversionProgress) => void;
