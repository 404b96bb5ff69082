import type { Row } from '../types/fragment.js';
import type { LogicalTable } from '../types/table.js';
import type { ValidationStatus } from '../types/validation.js';
import { parseNumber } from '../core/cells.js';
import { domainContains } from '../core/score-domains.js';
import { raiseStatus } from './status.js';
import { isDistributionTable, locateDistributionColumns } from './table-classifier.js';
import type { RuleContext, ValidationRule } from './types.js';

function cellNumber(row: Row, col: number): number | null {
  return row.length > col ? parseNumber(row[col], { stripPercent: true }) : null;
}

/** Body rows with their index in `table.data`; the first row is always the header here. */
function bodyRows(table: LogicalTable): Array<[number, Row]> {
  return table.data.slice(1).map((row, i): [number, Row] => [i + 1, row]);
}

function checkPercentTotal(table: LogicalTable, col: number, ctx: RuleContext): ValidationStatus {
  let total = 0;
  let count = 0;
  for (const [, row] of bodyRows(table)) {
    const v = cellNumber(row, col);
    if (v === null) continue;
    total += v;
    count++;
  }
  if (count === 0) return 'passed';

  const allowed = ctx.thresholds.tolerance * 100;
  if (Math.abs(total - 100) <= allowed) return 'passed';

  ctx.report.addIssue({
    severity: 'failed',
    message: `Percent column does not sum to 100.00 (got ${total.toFixed(2)})`,
    table_name: ctx.tableName,
    column_name: table.schema.headers[col],
    details: { expected: 100, actual: total, tolerance: allowed }
  });
  return 'failed';
}

function checkNonNegativeFrequency(table: LogicalTable, col: number, ctx: RuleContext): ValidationStatus {
  let status: ValidationStatus = 'passed';
  for (const [idx, row] of bodyRows(table)) {
    const v = cellNumber(row, col);
    if (v === null || v >= 0) continue;
    ctx.report.addIssue({
      severity: 'failed',
      message: `Negative frequency found: ${v}`,
      table_name: ctx.tableName,
      row_index: idx,
      column_name: table.schema.headers[col],
      details: { value: v }
    });
    status = 'failed';
  }
  return status;
}

function checkMonotonicCumulative(table: LogicalTable, col: number, ctx: RuleContext): ValidationStatus {
  let status: ValidationStatus = 'passed';
  let previous: number | null = null;
  for (const [idx, row] of bodyRows(table)) {
    const v = cellNumber(row, col);
    if (v === null) continue;
    if (previous !== null && v < previous) {
      ctx.report.addIssue({
        severity: 'failed',
        message: `Cumulative frequency not monotonic: ${v} < ${previous}`,
        table_name: ctx.tableName,
        row_index: idx,
        column_name: table.schema.headers[col],
        details: { previous, value: v }
      });
      status = 'failed';
    }
    previous = v;
  }
  return status;
}

function checkScoreDomain(table: LogicalTable, col: number, ctx: RuleContext): ValidationStatus {
  const domain = table.score_domain;
  if (!domain) return 'passed';

  let status: ValidationStatus = 'passed';
  for (const [idx, row] of bodyRows(table)) {
    const v = cellNumber(row, col);
    if (v === null || domainContains(domain, v)) continue;
    ctx.report.addIssue({
      severity: 'warning',
      message: `Score ${v} outside domain range [${domain.min_score}, ${domain.max_score}]`,
      table_name: ctx.tableName,
      row_index: idx,
      column_name: table.schema.headers[col],
      details: { score: v, domain: domain.name }
    });
    status = 'warning';
  }
  return status;
}

export const distributionRule: ValidationRule = {
  id: 'distribution-table',
  applies: (table, thresholds) => isDistributionTable(table, thresholds.distributionKeywordMin),
  check(table: LogicalTable, ctx: RuleContext): ValidationStatus {
    const cols = locateDistributionColumns(table.schema.headers);
    let status: ValidationStatus = 'passed';

    if (cols.percent !== null) status = raiseStatus(status, checkPercentTotal(table, cols.percent, ctx));
    if (cols.frequency !== null) status = raiseStatus(status, checkNonNegativeFrequency(table, cols.frequency, ctx));
    if (cols.cumulative !== null) status = raiseStatus(status, checkMonotonicCumulative(table, cols.cumulative, ctx));
    if (cols.score !== null) status = raiseStatus(status, checkScoreDomain(table, cols.score, ctx));

    return status;
  }
};
