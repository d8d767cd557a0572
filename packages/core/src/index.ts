// Model
export { ModelIndex } from './model/model-index.js';
export { ElementType, RelationshipType } from './model/model-types.js';
export type {
  ModelElement,
  ModelRelationship,
  ModelStats,
  ProcessAnalysis,
  ProcessInfo,
} from './model/model-types.js';

// Analyzers
export { createAnalyzer } from './analyzers/analyzer-factory.js';
export { ArchimateAnalyzer } from './analyzers/archimate/analyzer.js';
export { classifyProcesses } from './analyzers/archimate/process-classifier.js';
export type { ModelAnalyzer } from './analyzers/model-analyzer.js';
export type { AnalyzerMetadata } from './analyzers/analyzer-metadata.js';

// Exporters
export { createExporter, isExportFormat } from './exporters/exporter-factory.js';
export type { ExporterOptions } from './exporters/exporter-factory.js';
export { ConsoleExporter } from './exporters/console-exporter.js';
export { CsvExporter } from './exporters/csv-exporter.js';
export { TableExporter } from './exporters/table-exporter.js';
export { EXPORT_FORMATS } from './exporters/report-exporter.js';
export type {
  ExportFormat,
  ExportResult,
  LineWriter,
  ReportExporter,
  ReportRow,
  TabularData,
} from './exporters/report-exporter.js';

// Reports
export { createReport, resolveReportKind } from './reports/report-factory.js';
export { ProcessStatusReport } from './reports/process-status-report.js';
export type { ProcessStatusOptions } from './reports/process-status-report.js';
export { ComponentServicesReport } from './reports/component-services-report.js';
export { REPORT_KINDS } from './reports/report.js';
export type { Report, ReportKind } from './reports/report.js';

// Pipelines (headless orchestration functions)
export { runReport } from './pipelines/report.js';
export type { ReportOptions, ReportResult } from './pipelines/report.js';
export type { ProgressReporter } from './pipelines/progress.js';
export { SilentProgress } from './pipelines/progress.js';

// Config
export { CONFIG } from './utils/config.js';
export type { Config } from './utils/config.js';

// Errors
export {
  ArchiReportError,
  ConfigurationError,
  AnalyzerError,
  ModelParseError,
  ErrorCode,
} from './errors.js';

// Validation
export { validate, validatePath } from './utils/validation.js';

// Schemas
export { PackageJsonSchema } from './schemas/package.schema.js';
