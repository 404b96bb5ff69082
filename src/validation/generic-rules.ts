import type { LogicalTable } from '../types/table.js';
import type { ValidationStatus } from '../types/validation.js';
import type { RuleContext, ValidationRule } from './types.js';

export const duplicateRowsRule: ValidationRule = {
  id: 'no-duplicate-rows',
  applies: () => true,
  check(table: LogicalTable, ctx: RuleContext): ValidationStatus {
    if (table.data.length <= 1) return 'passed';

    const offset = table.schema.has_header ? 1 : 0;
    const firstSeen = new Map<string, number>();

    for (let i = offset; i < table.data.length; i++) {
      const cells = table.data[i].map((c) => String(c ?? '').trim());
      const key = JSON.stringify(cells);
      const earlier = firstSeen.get(key);

      if (earlier !== undefined && cells.some((c) => c.length > 0)) {
        ctx.report.addIssue({
          severity: 'failed',
          message: 'Duplicate row found',
          table_name: ctx.tableName,
          row_index: i,
          details: { row_content: cells, first_row_index: earlier }
        });
        return 'failed';
      }
      if (earlier === undefined) firstSeen.set(key, i);
    }

    return 'passed';
  }
};

export const columnConsistencyRule: ValidationRule = {
  id: 'column-consistency',
  applies: () => true,
  check(table: LogicalTable, ctx: RuleContext): ValidationStatus {
    const expected = table.schema.column_count;
    let status: ValidationStatus = 'passed';

    for (let i = 0; i < table.data.length; i++) {
      const row = table.data[i];
      if (row.length === expected) continue;
      ctx.report.addIssue({
        severity: 'warning',
        message: `Inconsistent column count: expected ${expected}, got ${row.length}`,
        table_name: ctx.tableName,
        row_index: i,
        details: { expected, actual: row.length }
      });
      status = 'warning';
    }

    return status;
  }
};

export const headerPresenceRule: ValidationRule = {
  id: 'header-presence',
  applies: () => true,
  check(table: LogicalTable, ctx: RuleContext): ValidationStatus {
    if (table.schema.has_header || table.data.length === 0) return 'passed';
    ctx.report.addIssue({
      severity: 'warning',
      message: 'Table has no detected header',
      table_name: ctx.tableName,
      details: { rows: table.data.length }
    });
    return 'warning';
  }
};
