import { describe, it, expect } from 'vitest';
import { segmentTables, TableSegmenter } from '../../src/segmentation/segmenter.js';
import { TableStitcherError, UnknownStrategyError } from '../../src/core/errors.js';
import { fragment } from '../fixtures.js';

const scoreFragments = [fragment(1, [['Score', 'Freq'], ['0', '5'], ['1', '3']])];
const rosterFragments = [
  fragment(1, [['Name', 'Position'], ['Ann', 'Clerk']]),
  fragment(2, [['Name', 'Position'], ['Bo', 'Driver']])
];

describe('TableSegmenter', () => {
  it('should resolve auto through the detector', () => {
    const segmenter = new TableSegmenter();
    expect(segmenter.resolveStrategy(scoreFragments, 'auto')).toBe('score_domain');
    expect(segmenter.resolveStrategy(rosterFragments, 'auto')).toBe('header_repetition');
    expect(segmenter.resolveStrategy(scoreFragments, 'header_repetition')).toBe('header_repetition');
  });

  it('should dispatch to the chosen segmenter', () => {
    const tables = segmentTables(rosterFragments, 'auto');
    expect(tables).toHaveLength(2);
    expect(tables.every((t) => t.segmentation_strategy === 'header_repetition')).toBe(true);

    const scored = segmentTables(scoreFragments, 'score_domain');
    expect(scored[0].score_domain?.name).toBe('Score Range 0-1');
  });

  it('should apply its thresholds', () => {
    const segmenter = new TableSegmenter({ thresholds: { minHeaderRepeats: 3 } });
    expect(segmenter.segment(rosterFragments, 'header_repetition')).toHaveLength(1);
  });

  it('should reject an unknown strategy', () => {
    const segmenter = new TableSegmenter();
    const attempt = () => Reflect.apply(segmenter.segment, segmenter, [scoreFragments, 'by_colour']);

    expect(attempt).toThrow(UnknownStrategyError);
    expect(attempt).toThrow('Unknown segmentation strategy: by_colour');
    try {
      attempt();
    } catch (error) {
      expect(error).toBeInstanceOf(TableStitcherError);
      if (error instanceof UnknownStrategyError) {
        expect(error.code).toBe('UNKNOWN_STRATEGY');
        expect(error.strategy).toBe('by_colour');
      }
    }
  });
});
