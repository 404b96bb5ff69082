export type ValidationStatus = 'passed' | 'warning' | 'failed';

export type IssueDetails = Record<string, unknown>;

export interface ValidationIssue {
  severity: ValidationStatus;
  message: string;
  table_name: string;
  row_index?: number;
  column_name?: string;
  details: IssueDetails;
}

export interface ValidationSummary {
  tables_validated: number;
  tables_passed: number;
  tables_with_warnings: number;
  tables_failed: number;
}

/** Serialized form consumed by auditors; field names are fixed. */
export interface ValidationReportJSON {
  overall_status: ValidationStatus;
  issues: Array<{
    severity: ValidationStatus;
    message: string;
    table_name: string;
    row_index: number | null;
    column_name: string | null;
    details: IssueDetails;
  }>;
  summary: ValidationSummary;
  timestamp: string;
}
