import { readFile } from 'fs/promises';
import type { ProgressReporter } from './progress.js';
import { SilentProgress } from './progress.js';
import { createAnalyzer } from '../analyzers/analyzer-factory.js';
import { createExporter } from '../exporters/exporter-factory.js';
import type { ExportResult, LineWriter } from '../exporters/report-exporter.js';
import { createReport } from '../reports/report-factory.js';
import type { ReportKind } from '../reports/report.js';
import { ArchiReportError, ErrorCode } from '../errors.js';
import { CONFIG } from '../utils/config.js';
import { validatePath } from '../utils/validation.js';

export interface ReportOptions {
  modelPath: string;
  report: ReportKind;
  showServed?: boolean;
  format?: string;
  outputDir?: string;
  modelFormat?: string;
  /** Line sink for console and table output; defaults to stdout. */
  write?: LineWriter;
  now?: () => Date;
}

export interface ReportResult {
  report: ReportKind;
  servedCount: number;
  unservedCount: number;
  componentCount: number;
  export: ExportResult;
}

async function readModel(modelPath: string): Promise<string> {
  try {
    return await readFile(modelPath, 'utf-8');
  } catch (error) {
    throw ArchiReportError.fromError(
      error,
      ErrorCode.IO_FILE_NOT_FOUND,
      `Cannot read model file: ${modelPath}`
    );
  }
}

export async function runReport(
  options: ReportOptions,
  progress?: ProgressReporter
): Promise<ReportResult> {
  const p = progress ?? new SilentProgress();
  const analyzer = createAnalyzer(options.modelFormat ?? CONFIG.model.format);
  const format = options.format ?? CONFIG.output.format;

  p.section(`Loading ${analyzer.metadata.displayName} Model`);
  validatePath(options.modelPath);
  p.start('Parsing model document');
  const content = await readModel(options.modelPath);
  try {
    analyzer.parse(content);
  } catch (error) {
    p.fail(`Could not parse ${options.modelPath}`);
    throw error;
  }

  const stats = analyzer.getModelStats();
  p.succeed(`Indexed ${String(stats.elements)} elements`);
  if (CONFIG.debug.verbose) {
    p.info(
      `${String(stats.relationships)} relationships, ${String(stats.businessProcesses)} business processes`
    );
  }

  const analysis = analyzer.analyze();
  if (stats.businessProcesses === 0) {
    p.warn('The model contains no business processes');
  }
  p.succeed(
    `Classified ${String(stats.businessProcesses)} business processes (${String(analysis.servedProcesses.length)} served, ${String(analysis.unservedProcesses.length)} unserved)`
  );

  const exporter = createExporter(format, {
    reportName: options.report,
    outputDir: options.outputDir ?? CONFIG.output.reportsDir,
    write: options.write,
    now: options.now,
  });
  const report = createReport(options.report, exporter, { showServed: options.showServed });
  const exported = await report.generate(analysis);
  if (exported.destination) {
    p.succeed(`Wrote ${String(exported.rowCount)} rows to ${exported.destination}`);
  }

  return {
    report: options.report,
    servedCount: analysis.servedProcesses.length,
    unservedCount: analysis.unservedProcesses.length,
    componentCount: analysis.appComponentServices.size,
    export: exported,
  };
}
