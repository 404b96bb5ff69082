import type { Fragment } from '../types/fragment.js';
import type { LogicalTable, ScoreDomain, SegmentationStrategy, StrategyChoice } from '../types/table.js';
import { DEFAULT_SEGMENTATION_THRESHOLDS, type SegmentationThresholds } from '../types/config.js';
import { detectStrategy } from '../core/strategy-detector.js';
import { UnknownStrategyError } from '../core/errors.js';
import type { ScoreDomainRegistry } from '../core/score-domains.js';
import { segmentByScoreDomain } from './score-domain-segmenter.js';
import { segmentByHeaderRepetition } from './header-repetition-segmenter.js';

export type TableSegmenterOptions = {
  thresholds?: Partial<SegmentationThresholds>;
};

function rejectStrategy(strategy: never): never {
  throw new UnknownStrategyError(String(strategy));
}

export class TableSegmenter {
  private thresholds: SegmentationThresholds;

  constructor(options?: TableSegmenterOptions) {
    this.thresholds = { ...DEFAULT_SEGMENTATION_THRESHOLDS, ...options?.thresholds };
  }

  resolveStrategy(fragments: Fragment[], strategy: StrategyChoice): SegmentationStrategy {
    return strategy === 'auto' ? detectStrategy(fragments, this.thresholds) : strategy;
  }

  /**
   * Reassembles fragments into logical tables. `auto` defers to the
   * strategy detector; a tag outside the known strategies throws
   * UnknownStrategyError.
   */
  segment(
    fragments: Fragment[],
    strategy: StrategyChoice,
    domains?: ScoreDomain[] | ScoreDomainRegistry
  ): LogicalTable[] {
    const resolved = this.resolveStrategy(fragments, strategy);
    switch (resolved) {
      case 'score_domain':
        return segmentByScoreDomain(fragments, domains, { domainGap: this.thresholds.domainGap });
      case 'header_repetition':
        return segmentByHeaderRepetition(fragments, { minHeaderRepeats: this.thresholds.minHeaderRepeats });
      default:
        return rejectStrategy(resolved);
    }
  }
}

export function segmentTables(
  fragments: Fragment[],
  strategy: StrategyChoice,
  domains?: ScoreDomain[] | ScoreDomainRegistry,
  options?: TableSegmenterOptions
): LogicalTable[] {
  return new TableSegmenter(options).segment(fragments, strategy, domains);
}
