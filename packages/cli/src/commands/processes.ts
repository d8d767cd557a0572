import { Command } from 'commander';
import { CONFIG, validate } from '@archi-reports/core';
import { ErrorHandler } from '../utils/error-handler.js';
import { ProcessesOptionsSchema } from '../utils/command-schemas.js';
import { executeReport } from './run-report.js';

export function createProcessesCommand(): Command {
  return new Command('processes')
    .description('List business processes by served/unserved status')
    .argument('[model-file]', 'ArchiMate exchange-format model file', CONFIG.model.file)
    .option('--served', 'Show served processes instead of unserved ones', false)
    .option('--format <format>', 'Output format (console, csv, table)', CONFIG.output.format)
    .option('--output-dir <dir>', 'Directory for CSV reports', CONFIG.output.reportsDir)
    .action(async (modelFile: string, options: unknown) => {
      try {
        const validated = validate(ProcessesOptionsSchema, options, 'command options');
        await executeReport({
          modelPath: modelFile,
          report: 'process-status',
          showServed: validated.served,
          format: validated.format,
          outputDir: validated.outputDir,
        });
      } catch (error) {
        ErrorHandler.handleCliError(error);
      }
    });
}
