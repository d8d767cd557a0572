import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { ArchiReportError, ErrorCode } from '../errors.js';
import type { ExportResult, ReportExporter, ReportRow, TabularData } from './report-exporter.js';

export interface CsvExporterOptions {
  /** File name prefix, e.g. `process-status`. */
  reportName: string;
  outputDir: string;
  now?: () => Date;
}

const csvEscape = (value: string): string => {
  if (
    value.includes('"') ||
    value.includes(',') ||
    value.includes('\n') ||
    value.includes('\r')
  ) {
    return `"${value.replaceAll('"', '""')}"`;
  }
  return value;
};

const pad2 = (n: number): string => String(n).padStart(2, '0');

/** Local-time stamp formatted as YYYYMMDD_HHMMSS. */
export function formatTimestamp(date: Date): string {
  const day = `${String(date.getFullYear())}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`;
  return `${day}_${time}`;
}

// A lone empty field is quoted so the row is not read back as a blank line.
function toCsvLine(fields: readonly string[]): string {
  if (fields.length === 1 && fields[0] === '') return '""';
  return fields.map(csvEscape).join(',');
}

export function toCsv(columns: readonly string[], rows: readonly ReportRow[]): string {
  const lines = [
    toCsvLine(columns),
    ...rows.map((row) => toCsvLine(columns.map((column) => row[column] ?? ''))),
  ];
  return lines.map((line) => `${line}\r\n`).join('');
}

export class CsvExporter implements ReportExporter {
  readonly format = 'csv';
  private readonly now: () => Date;

  constructor(private readonly options: CsvExporterOptions) {
    this.now = options.now ?? (() => new Date());
  }

  async exportData({ rows, columns }: TabularData): Promise<ExportResult> {
    const { outputDir, reportName } = this.options;
    const destination = join(outputDir, `${reportName}_${formatTimestamp(this.now())}.csv`);

    try {
      await mkdir(outputDir, { recursive: true });
      await writeFile(destination, toCsv(columns, rows), 'utf-8');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ArchiReportError(
        `Failed to write CSV report: ${message}`,
        ErrorCode.IO_WRITE_FAILED,
        `Could not write report to ${destination}`,
        { path: destination }
      );
    }

    return { rowCount: rows.length, destination };
  }
}
