import type { LogicalTable } from '../types/table.js';
import type { ValidationStatus } from '../types/validation.js';
import { DEFAULT_VALIDATION_THRESHOLDS, type ValidationThresholds } from '../types/config.js';
import { columnConsistencyRule, duplicateRowsRule, headerPresenceRule } from './generic-rules.js';
import { distributionRule } from './distribution-rules.js';
import { rosterOrphanRule } from './roster-rules.js';
import { raiseStatus, ValidationReport } from './status.js';
import type { ValidationRule } from './types.js';

/** Generic checks first, then the type-specific ones. Order is part of the report contract. */
export const VALIDATION_CHAIN: readonly ValidationRule[] = Object.freeze([
  duplicateRowsRule,
  columnConsistencyRule,
  headerPresenceRule,
  distributionRule,
  rosterOrphanRule
]);

export type TableValidatorOptions = Partial<ValidationThresholds> & {
  clock?: () => Date;
};

export class TableValidator {
  private thresholds: ValidationThresholds;
  private clock: () => Date;

  constructor(options?: TableValidatorOptions) {
    this.thresholds = {
      tolerance: options?.tolerance ?? DEFAULT_VALIDATION_THRESHOLDS.tolerance,
      distributionKeywordMin:
        options?.distributionKeywordMin ?? DEFAULT_VALIDATION_THRESHOLDS.distributionKeywordMin
    };
    this.clock = options?.clock ?? (() => new Date());
  }

  get tolerance(): number {
    return this.thresholds.tolerance;
  }

  /**
   * Runs the rule chain over every table. Missing names default to
   * `Table_1`, `Table_2`, ... The returned report is frozen.
   */
  validateTables(tables: LogicalTable[], names?: string[]): ValidationReport {
    const report = new ValidationReport(this.clock());

    tables.forEach((table, i) => {
      const name = names?.[i] ?? `Table_${i + 1}`;
      report.recordTable(this.validateTable(table, name, report));
    });

    return report.freeze();
  }

  /** Worst severity any rule raised for this table. */
  validateTable(table: LogicalTable, tableName: string, report: ValidationReport): ValidationStatus {
    let worst: ValidationStatus = 'passed';
    const ctx = { tableName, report, thresholds: this.thresholds };

    for (const rule of VALIDATION_CHAIN) {
      if (!rule.applies(table, this.thresholds)) continue;
      worst = raiseStatus(worst, rule.check(table, ctx));
    }

    return worst;
  }
}
