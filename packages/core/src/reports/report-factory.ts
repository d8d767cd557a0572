import { ConfigurationError } from '../errors.js';
import type { ReportExporter } from '../exporters/report-exporter.js';
import { ComponentServicesReport } from './component-services-report.js';
import { ProcessStatusReport } from './process-status-report.js';
import type { ProcessStatusOptions } from './process-status-report.js';
import { REPORT_KINDS } from './report.js';
import type { Report, ReportKind } from './report.js';

// Numeric report ids accepted by the `--report` flag.
const REPORT_NUMBERS = new Map<string, ReportKind>([
  ['1', 'process-status'],
  ['2', 'component-services'],
]);

export function resolveReportKind(value: string): ReportKind {
  const byNumber = REPORT_NUMBERS.get(value);
  if (byNumber) return byNumber;
  const byName = REPORT_KINDS.find((kind) => kind === value);
  if (byName) return byName;
  throw new ConfigurationError(
    `Unknown report: "${value}". Use 1 (process-status) or 2 (component-services)`,
    'report'
  );
}

export function createReport(
  kind: ReportKind,
  exporter: ReportExporter,
  options: ProcessStatusOptions = {}
): Report {
  switch (kind) {
    case 'component-services':
      return new ComponentServicesReport(exporter);
    case 'process-status':
      return new ProcessStatusReport(exporter, options);
  }
}
