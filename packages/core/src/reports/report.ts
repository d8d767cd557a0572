import type { ProcessAnalysis } from '../model/model-types.js';
import type { ExportResult, TabularData } from '../exporters/report-exporter.js';

export type ReportKind = 'process-status' | 'component-services';

export const REPORT_KINDS: readonly ReportKind[] = ['process-status', 'component-services'];

/** Turns a process analysis into rows and hands them to an exporter. */
export interface Report {
  readonly kind: ReportKind;
  buildTable(analysis: ProcessAnalysis): TabularData;
  generate(analysis: ProcessAnalysis): Promise<ExportResult>;
}

// Code-point order, independent of locale.
export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
