import { Command } from 'commander';
import { CONFIG, resolveReportKind, validate } from '@archi-reports/core';
import { ErrorHandler } from '../utils/error-handler.js';
import { ReportOptionsSchema } from '../utils/command-schemas.js';
import { executeReport } from './run-report.js';

export function createReportCommand(): Command {
  return new Command('report')
    .description('Analyze business processes in an ArchiMate model')
    .option(
      '--report <type>',
      'Report type: 1=Processes by served/unserved status, 2=Application Components with their served processes',
      '1'
    )
    .option('--file <path>', 'Path to the XML file', CONFIG.model.file)
    .option(
      '--served',
      'Show served processes instead of unserved ones (only for report type 1)',
      false
    )
    .option('--format <format>', 'Output format for the report', CONFIG.output.format)
    .option('--output-dir <dir>', 'Directory for CSV reports', CONFIG.output.reportsDir)
    .action(async (options: unknown) => {
      try {
        const validated = validate(ReportOptionsSchema, options, 'command options');
        await executeReport({
          modelPath: validated.file,
          report: resolveReportKind(validated.report),
          showServed: validated.served,
          format: validated.format,
          outputDir: validated.outputDir,
        });
      } catch (error) {
        ErrorHandler.handleCliError(error);
      }
    });
}
