import type { LogicalTable } from '../types/table.js';
import type { ValidationStatus } from '../types/validation.js';
import type { ValidationThresholds } from '../types/config.js';
import type { ValidationReport } from './status.js';

export type RuleContext = {
  tableName: string;
  report: ValidationReport;
  thresholds: ValidationThresholds;
};

/**
 * One check in the fixed validation chain. Rules report through
 * `ctx.report` and return the worst severity they raised; they never throw.
 */
export interface ValidationRule {
  readonly id: string;
  applies(table: LogicalTable, thresholds: ValidationThresholds): boolean;
  check(table: LogicalTable, ctx: RuleContext): ValidationStatus;
}
