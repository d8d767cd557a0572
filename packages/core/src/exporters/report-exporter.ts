export type ExportFormat = 'console' | 'csv' | 'table';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['console', 'csv', 'table'];

/** One report row keyed by column name; an absent value renders as blank. */
export type ReportRow = Readonly<Record<string, string | undefined>>;

export interface TabularData {
  header: string;
  rows: readonly ReportRow[];
  columns: readonly string[];
}

export interface ExportResult {
  rowCount: number;
  /** Where the data went, for exporters that write files. */
  destination?: string;
}

export type LineWriter = (line: string) => void;

export interface ReportExporter {
  readonly format: ExportFormat;
  exportData(data: TabularData): Promise<ExportResult>;
}

export const writeToStdout: LineWriter = (line) => {
  console.log(line);
};
