import type {
  ValidationIssue,
  ValidationReportJSON,
  ValidationStatus,
  ValidationSummary
} from '../types/validation.js';

const STATUS_RANK: Record<ValidationStatus, number> = {
  passed: 0,
  warning: 1,
  failed: 2
};

/** Lattice join: passed < warning < failed. */
export function raiseStatus(current: ValidationStatus, next: ValidationStatus): ValidationStatus {
  return STATUS_RANK[next] > STATUS_RANK[current] ? next : current;
}

export function worstStatus(statuses: ValidationStatus[]): ValidationStatus {
  return statuses.reduce<ValidationStatus>(raiseStatus, 'passed');
}

/**
 * Accumulates issues for one document. The overall status only moves up
 * the lattice; once frozen the report rejects further writes.
 */
export class ValidationReport {
  readonly timestamp: Date;
  private status: ValidationStatus = 'passed';
  private readonly issues: ValidationIssue[] = [];
  private readonly counts: ValidationSummary = {
    tables_validated: 0,
    tables_passed: 0,
    tables_with_warnings: 0,
    tables_failed: 0
  };
  private frozen = false;

  constructor(timestamp: Date = new Date()) {
    this.timestamp = timestamp;
  }

  /** A report for a document that could not be processed at all. */
  static failed(timestamp?: Date): ValidationReport {
    const report = new ValidationReport(timestamp);
    report.raiseTo('failed');
    return report.freeze();
  }

  get overallStatus(): ValidationStatus {
    return this.status;
  }

  get issueList(): readonly ValidationIssue[] {
    return this.issues;
  }

  get summary(): Readonly<ValidationSummary> {
    return { ...this.counts };
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  addIssue(issue: ValidationIssue): void {
    this.assertWritable();
    this.issues.push(issue);
    this.raiseTo(issue.severity);
  }

  /** Counts one validated table under its worst severity. */
  recordTable(status: ValidationStatus): void {
    this.assertWritable();
    this.counts.tables_validated++;
    switch (status) {
      case 'passed':
        this.counts.tables_passed++;
        break;
      case 'warning':
        this.counts.tables_with_warnings++;
        break;
      case 'failed':
        this.counts.tables_failed++;
        break;
    }
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  issuesFor(tableName: string): ValidationIssue[] {
    return this.issues.filter((i) => i.table_name === tableName);
  }

  toJSON(): ValidationReportJSON {
    return {
      overall_status: this.status,
      issues: this.issues.map((i) => ({
        severity: i.severity,
        message: i.message,
        table_name: i.table_name,
        row_index: i.row_index ?? null,
        column_name: i.column_name ?? null,
        details: { ...i.details }
      })),
      summary: { ...this.counts },
      timestamp: this.timestamp.toISOString()
    };
  }

  private raiseTo(status: ValidationStatus): void {
    this.status = raiseStatus(this.status, status);
  }

  private assertWritable(): void {
    if (this.frozen) throw new Error('ValidationReport is frozen');
  }
}
