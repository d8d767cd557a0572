import chalk from 'chalk';
import { writeToStdout } from './report-exporter.js';
import type { ExportResult, LineWriter, ReportExporter, TabularData } from './report-exporter.js';

const MAX_COLUMN_WIDTH = 50;

function fitCell(value: string, width: number): string {
  const clipped =
    value.length > MAX_COLUMN_WIDTH ? value.substring(0, MAX_COLUMN_WIDTH - 3) + '...' : value;
  return clipped.padEnd(width);
}

export function formatTable({ rows, columns }: Omit<TabularData, 'header'>): string {
  if (rows.length === 0) {
    return chalk.gray('No data to display');
  }
  const widths = columns.map((column) => {
    const dataWidth = Math.max(...rows.map((row) => (row[column] ?? '').length));
    return Math.min(Math.max(column.length, dataWidth), MAX_COLUMN_WIDTH);
  });
  const header = columns.map((column, i) => fitCell(column, widths[i] ?? 0)).join(' | ');
  const separator = widths.map((width) => '-'.repeat(width)).join('-+-');
  const lines = rows.map((row) =>
    columns.map((column, i) => fitCell(row[column] ?? '', widths[i] ?? 0)).join(' | ')
  );
  return [chalk.bold(header), chalk.gray(separator), ...lines].join('\n');
}

export class TableExporter implements ReportExporter {
  readonly format = 'table';

  constructor(private readonly write: LineWriter = writeToStdout) {}

  exportData(data: TabularData): Promise<ExportResult> {
    this.write('\n' + chalk.bold.cyan(`── ${data.header} ──`));
    this.write(formatTable(data));
    return Promise.resolve({ rowCount: data.rows.length });
  }
}
