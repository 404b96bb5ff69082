export { TableValidator, VALIDATION_CHAIN, type TableValidatorOptions } from './validator.js';
export { ValidationReport, raiseStatus, worstStatus } from './status.js';
export {
  isDistributionTable,
  isRosterTable,
  findColumnIndex,
  locateDistributionColumns,
  COLUMN_KEYWORDS,
  DISTRIBUTION_INDICATORS,
  ROSTER_INDICATORS
} from './table-classifier.js';
export type { ValidationRule, RuleContext } from './types.js';
