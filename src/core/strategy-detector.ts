import type { Fragment } from '../types/fragment.js';
import type { SegmentationStrategy } from '../types/table.js';
import { DEFAULT_SEGMENTATION_THRESHOLDS, type SegmentationThresholds } from '../types/config.js';
import { isNumeric, rowKey } from './cells.js';
import { createDebugLogger } from '../utils/debug.js';

const debug = createDebugLogger('strategy');

export type StrategyReason = 'numeric_first_column' | 'repeated_header' | 'default';

export type StrategyDecision = {
  strategy: SegmentationStrategy;
  reason: StrategyReason;
  /** fragment whose first column or first row settled the decision */
  fragmentIndex?: number;
};

/** Share of a fragment's body rows whose first cell reads as a number. */
export function numericFirstColumnShare(fragment: Fragment): number | null {
  const body = (fragment.data ?? []).slice(1).filter((row) => row.length > 0);
  if (body.length === 0) return null;
  const numeric = body.filter((row) => isNumeric(row[0])).length;
  return numeric / body.length;
}

export function decideStrategy(
  fragments: Fragment[],
  thresholds: Partial<Pick<SegmentationThresholds, 'numericRatio'>> = {}
): StrategyDecision {
  const ratio = thresholds.numericRatio ?? DEFAULT_SEGMENTATION_THRESHOLDS.numericRatio;

  for (let i = 0; i < fragments.length; i++) {
    const share = numericFirstColumnShare(fragments[i]);
    if (share !== null && share >= ratio) {
      debug('score column found', { fragment: i, share });
      return { strategy: 'score_domain', reason: 'numeric_first_column', fragmentIndex: i };
    }
  }

  const seen = new Set<string>();
  for (let i = 0; i < fragments.length; i++) {
    const first = fragments[i].data?.[0];
    if (!first) continue;
    const key = rowKey(first);
    if (seen.has(key)) {
      debug('first row repeats', { fragment: i });
      return { strategy: 'header_repetition', reason: 'repeated_header', fragmentIndex: i };
    }
    seen.add(key);
  }

  return { strategy: 'header_repetition', reason: 'default' };
}

export function detectStrategy(
  fragments: Fragment[],
  thresholds?: Partial<Pick<SegmentationThresholds, 'numericRatio'>>
): SegmentationStrategy {
  return decideStrategy(fragments, thresholds).strategy;
}
