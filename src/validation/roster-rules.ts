import type { LogicalTable } from '../types/table.js';
import type { ValidationStatus } from '../types/validation.js';
import { nonBlankCells } from '../core/cells.js';
import { isRosterTable } from './table-classifier.js';
import type { RuleContext, ValidationRule } from './types.js';

/**
 * Two single-cell rows back to back look like spilled fragments rather
 * than a section title followed by its data.
 */
export const rosterOrphanRule: ValidationRule = {
  id: 'roster-orphan-rows',
  applies: (table) => isRosterTable(table),
  check(table: LogicalTable, ctx: RuleContext): ValidationStatus {
    let status: ValidationStatus = 'passed';

    for (let i = 1; i < table.data.length - 1; i++) {
      const filled = nonBlankCells(table.data[i]);
      if (filled.length !== 1) continue;
      if (nonBlankCells(table.data[i + 1]).length !== 1) continue;

      ctx.report.addIssue({
        severity: 'warning',
        message: 'Possible orphan row detected',
        table_name: ctx.tableName,
        row_index: i,
        details: { content: filled[0] }
      });
      status = 'warning';
    }

    return status;
  }
};
