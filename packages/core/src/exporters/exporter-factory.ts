import { ConfigurationError } from '../errors.js';
import { ConsoleExporter } from './console-exporter.js';
import { CsvExporter } from './csv-exporter.js';
import { TableExporter } from './table-exporter.js';
import { EXPORT_FORMATS } from './report-exporter.js';
import type { ExportFormat, LineWriter, ReportExporter } from './report-exporter.js';

export interface ExporterOptions {
  /** CSV file name prefix. */
  reportName: string;
  outputDir: string;
  write?: LineWriter;
  now?: () => Date;
}

export function isExportFormat(format: string): format is ExportFormat {
  return EXPORT_FORMATS.some((supported) => supported === format);
}

export function createExporter(format: string, options: ExporterOptions): ReportExporter {
  if (!isExportFormat(format)) {
    throw new ConfigurationError(
      `Unknown output format: "${format}". Supported formats: ${EXPORT_FORMATS.join(', ')}`,
      'ARCHI_OUTPUT_FORMAT'
    );
  }

  switch (format) {
    case 'csv':
      return new CsvExporter({
        reportName: options.reportName,
        outputDir: options.outputDir,
        now: options.now,
      });
    case 'table':
      return new TableExporter(options.write);
    default:
      return new ConsoleExporter(options.write);
  }
}
