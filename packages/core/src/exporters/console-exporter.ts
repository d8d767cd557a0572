import { writeToStdout } from './report-exporter.js';
import type { ExportResult, LineWriter, ReportExporter, TabularData } from './report-exporter.js';

/** Numbered plain-text listing: `1. Order Processing - Order System`. */
export class ConsoleExporter implements ReportExporter {
  readonly format = 'console';

  constructor(private readonly write: LineWriter = writeToStdout) {}

  exportData({ header, rows, columns }: TabularData): Promise<ExportResult> {
    this.write(`\n${header}`);
    this.write(`Found ${String(rows.length)} items:`);

    rows.forEach((row, idx) => {
      const values = columns
        .map((column) => row[column])
        .filter((value): value is string => value !== undefined);
      this.write(`${String(idx + 1)}. ${values.join(' - ')}`);
    });

    return Promise.resolve({ rowCount: rows.length });
  }
}
