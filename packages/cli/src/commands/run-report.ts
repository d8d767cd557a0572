import { runReport } from '@archi-reports/core';
import type { ReportOptions, ReportResult } from '@archi-reports/core';
import { createProgress } from '../utils/cli-helpers.js';

/**
 * Run a report from the CLI. Console and table output go to stdout alone;
 * CSV exports also show progress and the written path.
 */
export function executeReport(options: ReportOptions): Promise<ReportResult> {
  const progress = options.format === 'csv' ? createProgress() : undefined;
  return runReport(options, progress);
}
