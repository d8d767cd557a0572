import type { ProcessAnalysis } from '../model/model-types.js';
import type {
  ExportResult,
  ReportExporter,
  ReportRow,
  TabularData,
} from '../exporters/report-exporter.js';
import { compareNames } from './report.js';
import type { Report } from './report.js';

export class ComponentServicesReport implements Report {
  readonly kind = 'component-services';

  constructor(private readonly exporter: ReportExporter) {}

  buildTable(analysis: ProcessAnalysis): TabularData {
    const rows: ReportRow[] = [];
    const components = [...analysis.appComponentServices.entries()].sort(([a], [b]) =>
      compareNames(a, b)
    );
    for (const [component, processes] of components) {
      for (const process of [...processes].sort(compareNames)) {
        rows.push({ 'Application Component': component, 'Process Name': process });
      }
    }

    return {
      header: 'Application Components and Their Served Processes',
      rows,
      columns: ['Application Component', 'Process Name'],
    };
  }

  generate(analysis: ProcessAnalysis): Promise<ExportResult> {
    return this.exporter.exportData(this.buildTable(analysis));
  }
}
