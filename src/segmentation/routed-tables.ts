import type { ExtractionMode, LogicalTable } from '../types/table.js';

export class RoutedTables {
  readonly pageTables: LogicalTable[];
  readonly logicalTables: LogicalTable[];

  constructor(pageTables: LogicalTable[], logicalTables: LogicalTable[]) {
    this.pageTables = pageTables;
    this.logicalTables = logicalTables;
  }

  getAllTables(mode: ExtractionMode): LogicalTable[] {
    switch (mode) {
      case 'hybrid':
        return [...this.pageTables, ...this.logicalTables];
      case 'page_only':
        return [...this.pageTables];
      case 'logical_only':
        return [...this.logicalTables];
      default: {
        const unreachable: never = mode;
        throw new Error(`Unknown extraction mode: ${String(unreachable)}`);
      }
    }
  }
}
