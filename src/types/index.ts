export type * from './fragment.js';
export type * from './table.js';
export type * from './validation.js';
export type * from './profile.js';
export type * from './output.js';
export type {
  TableStitcherConfig,
  SegmentationThresholds,
  ValidationThresholds,
  ChainableTableStitcher,
  ConversionProgress,
  ProgressCallback
} from './config.js';
export {
  DEFAULT_SEGMENTATION_THRESHOLDS,
  DEFAULT_VALIDATION_THRESHOLDS,
  DEFAULT_MIN_PROFILE_CONFIDENCE
} from './config.js';
