import type { ProcessAnalysis } from '../model/model-types.js';
import type {
  ExportResult,
  ReportExporter,
  ReportRow,
  TabularData,
} from '../exporters/report-exporter.js';
import { compareNames } from './report.js';
import type { Report } from './report.js';

export interface ProcessStatusOptions {
  /** List served processes with their component instead of unserved ones. */
  showServed?: boolean;
}

export class ProcessStatusReport implements Report {
  readonly kind = 'process-status';
  private readonly showServed: boolean;

  constructor(
    private readonly exporter: ReportExporter,
    options: ProcessStatusOptions = {}
  ) {
    this.showServed = options.showServed ?? true;
  }

  buildTable(analysis: ProcessAnalysis): TabularData {
    const processes = this.showServed ? analysis.servedProcesses : analysis.unservedProcesses;
    const label = this.showServed ? 'Served' : 'Unserved';

    const rows: ReportRow[] = [...processes]
      .sort((a, b) => compareNames(a.name, b.name))
      .map((process) =>
        this.showServed
          ? { 'Process Name': process.name, 'Serving Component': process.servingComponent }
          : { 'Process Name': process.name }
      );

    return {
      header: `Process Status Report: ${label} Business Processes`,
      rows,
      columns: this.showServed ? ['Process Name', 'Serving Component'] : ['Process Name'],
    };
  }

  generate(analysis: ProcessAnalysis): Promise<ExportResult> {
    return this.exporter.exportData(this.buildTable(analysis));
  }
}
