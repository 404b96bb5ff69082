import { describe, it, expect } from 'vitest';
import { TableValidator } from '../../src/validation/validator.js';
import { isDistributionTable, isRosterTable, locateDistributionColumns } from '../../src/validation/table-classifier.js';
import { createScoreDomain } from '../../src/core/score-domains.js';
import type { LogicalTable } from '../../src/types/table.js';
import { fixedClock, table } from '../fixtures.js';

const DIST_HEADERS = ['Score', 'Frequency', 'Percent'];

function percentTable(percents: string[]): LogicalTable {
  return table(
    DIST_HEADERS,
    percents.map((p, i) => [String(10 + i), String(i + 1), p])
  );
}

describe('table classification', () => {
  it('should need two distribution keywords', () => {
    expect(isDistributionTable(table(['Score', 'Freq'], [['1', '2']]))).toBe(false);
    expect(isDistributionTable(table(DIST_HEADERS, [['1', '2', '3']]))).toBe(true);
    expect(isDistributionTable(table(['Score', 'Freq'], [['1', '2']]), 1)).toBe(true);
  });

  it('should spot roster headers', () => {
    expect(isRosterTable(table(['Staff ID', 'Grade'], []))).toBe(true);
    expect(isRosterTable(table(['Score', 'Frequency'], []))).toBe(false);
  });

  it('should locate distribution columns by keyword', () => {
    expect(locateDistributionColumns(['Score', 'Frequency', 'Cum. Freq', '%'])).toEqual({
      percent: 3,
      cumulative: 2,
      frequency: 1,
      score: 0
    });
  });
});

describe('TableValidator', () => {
  const validator = new TableValidator({ clock: fixedClock });

  it('should fail a percent column that misses 100 by more than the tolerance', () => {
    const report = validator.validateTables([percentTable(['20', '30', '48'])]);

    expect(report.overallStatus).toBe('failed');
    expect(report.toJSON().issues).toEqual([
      {
        severity: 'failed',
        message: 'Percent column does not sum to 100.00 (got 98.00)',
        table_name: 'Table_1',
        row_index: null,
        column_name: 'Percent',
        details: { expected: 100, actual: 98, tolerance: 1 }
      }
    ]);
    expect(report.summary.tables_failed).toBe(1);
  });

  it('should pass percent totals within the tolerance', () => {
    expect(validator.validateTables([percentTable(['20', '30', '49.5'])]).overallStatus).toBe('passed');
    expect(validator.validateTables([percentTable(['20', '30', '49'])]).overallStatus).toBe('passed');
    expect(validator.validateTables([percentTable(['20%', '30%', '50%'])]).overallStatus).toBe('passed');
  });

  it('should widen the percent window with a looser tolerance', () => {
    const loose = new TableValidator({ tolerance: 0.03, clock: fixedClock });
    expect(loose.tolerance).toBe(0.03);
    expect(loose.validateTables([percentTable(['20', '30', '48'])]).overallStatus).toBe('passed');
  });

  it('should fail a cumulative column that decreases', () => {
    const report = validator.validateTables([
      table(['Score', 'Frequency', 'Cumulative'], [['1', '10', '10'], ['2', '10', '20'], ['3', '0', '15']])
    ]);

    expect(report.overallStatus).toBe('failed');
    expect(report.issueList).toHaveLength(1);
    expect(report.issueList[0]).toMatchObject({
      severity: 'failed',
      message: 'Cumulative frequency not monotonic: 15 < 20',
      row_index: 3,
      column_name: 'Cumulative'
    });
  });

  it('should fail negative frequencies', () => {
    const report = validator.validateTables([table(DIST_HEADERS, [['1', '-3', '50'], ['2', '5', '50']])]);
    expect(report.issueList.map((i) => [i.message, i.row_index])).toEqual([['Negative frequency found: -3', 1]]);
    expect(report.overallStatus).toBe('failed');
  });

  it('should warn about scores outside the table domain', () => {
    const report = validator.validateTables([
      table(['Score', 'Frequency'], [['5', '1'], ['25', '2']], createScoreDomain('Objective', 0, 19))
    ]);

    expect(report.overallStatus).toBe('warning');
    expect(report.issueList[0]).toMatchObject({
      severity: 'warning',
      message: 'Score 25 outside domain range [0, 19]',
      row_index: 2,
      column_name: 'Score'
    });
    expect(report.summary.tables_with_warnings).toBe(1);
  });

  it('should leave non-numeric percent cells out of the total', () => {
    const report = validator.validateTables([percentTable(['20', 'n/a', '80'])]);
    expect(report.overallStatus).toBe('passed');
    expect(report.issueList).toHaveLength(0);
  });

  it('should skip non-numeric cumulative cells when checking order', () => {
    const headers = ['Score', 'Frequency', 'Cumulative'];
    const gaps = validator.validateTables([
      table(headers, [['1', '10', '10'], ['2', '0', ''], ['3', '0', 'x'], ['4', '10', '20']])
    ]);
    expect(gaps.overallStatus).toBe('passed');

    const drop = validator.validateTables([table(headers, [['1', '10', '10'], ['2', '0', 'x'], ['3', '0', '5']])]);
    expect(drop.overallStatus).toBe('failed');
    expect(drop.issueList.map((i) => [i.message, i.row_index])).toEqual([
      ['Cumulative frequency not monotonic: 5 < 10', 3]
    ]);
  });

  it('should ignore placeholder frequency cells', () => {
    const report = validator.validateTables([table(DIST_HEADERS, [['1', '-', '50'], ['2', '3', '50']])]);
    expect(report.overallStatus).toBe('passed');
    expect(report.issueList).toHaveLength(0);
  });

  it('should read missing trailing cells as absent', () => {
    const report = validator.validateTables([table(DIST_HEADERS, [['1', '2', '100'], ['2']])]);
    expect(report.issueList.map((i) => i.message)).toEqual(['Inconsistent column count: expected 3, got 1']);
    expect(report.overallStatus).toBe('warning');
  });

  it('should report the first duplicate row only', () => {
    const report = validator.validateTables([
      table(['Name', 'Position'], [['Ann', 'Clerk'], ['Bo', 'Driver'], [' Ann ', 'Clerk'], ['Bo', 'Driver']])
    ]);

    expect(report.toJSON().issues).toEqual([
      {
        severity: 'failed',
        message: 'Duplicate row found',
        table_name: 'Table_1',
        row_index: 3,
        column_name: null,
        details: { row_content: ['Ann', 'Clerk'], first_row_index: 1 }
      }
    ]);
  });

  it('should not treat blank rows as duplicates', () => {
    const report = validator.validateTables([table(['A', 'B'], [['', ''], ['', '']])]);
    expect(report.overallStatus).toBe('passed');
  });

  it('should check every row of a headerless table', () => {
    const headerless: LogicalTable = {
      data: [['x', '1'], ['x', '1']],
      schema: { headers: ['Column_1', 'Column_2'], column_count: 2, has_header: false, header_row_indices: [] },
      source_pages: [1],
      table_type: 'page_preserved'
    };
    const report = validator.validateTables([headerless]);

    expect(report.issueList.map((i) => [i.severity, i.message, i.row_index])).toEqual([
      ['failed', 'Duplicate row found', 1],
      ['warning', 'Table has no detected header', undefined]
    ]);
  });

  it('should warn on rows with the wrong width', () => {
    const report = validator.validateTables([table(['Name', 'Position'], [['Ann'], ['Bo', 'Driver', 'x']])]);

    expect(report.overallStatus).toBe('warning');
    expect(report.issueList.map((i) => i.message)).toEqual([
      'Inconsistent column count: expected 2, got 1',
      'Inconsistent column count: expected 2, got 3'
    ]);
    expect(report.issueList.map((i) => i.row_index)).toEqual([1, 2]);
  });

  it('should warn about orphan rows in rosters', () => {
    const report = validator.validateTables([
      table(['Name', 'Position'], [['Finance', ''], ['Accounts', ''], ['Ann', 'Clerk']])
    ]);

    expect(report.toJSON().issues).toEqual([
      {
        severity: 'warning',
        message: 'Possible orphan row detected',
        table_name: 'Table_1',
        row_index: 1,
        column_name: null,
        details: { content: 'Finance' }
      }
    ]);
  });

  it('should name tables and tally the summary', () => {
    const report = validator.validateTables(
      [
        percentTable(['50', '50']),
        table(['Name', 'Position'], [['Ann']]),
        percentTable(['10', '10'])
      ],
      ['Distribution']
    );

    expect(report.summary).toEqual({
      tables_validated: 3,
      tables_passed: 1,
      tables_with_warnings: 1,
      tables_failed: 1
    });
    expect(report.issueList.map((i) => i.table_name)).toEqual(['Table_2', 'Table_3']);
    expect(report.overallStatus).toBe('failed');
    expect(report.isFrozen).toBe(true);
    expect(report.timestamp.toISOString()).toBe('2024-05-06T07:08:09.000Z');
  });
});
