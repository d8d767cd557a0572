import { Command } from 'commander';
import { CONFIG, validate } from '@archi-reports/core';
import { ErrorHandler } from '../utils/error-handler.js';
import { ComponentsOptionsSchema } from '../utils/command-schemas.js';
import { executeReport } from './run-report.js';

export function createComponentsCommand(): Command {
  return new Command('components')
    .description('List application components with the processes they serve')
    .argument('[model-file]', 'ArchiMate exchange-format model file', CONFIG.model.file)
    .option('--format <format>', 'Output format (console, csv, table)', CONFIG.output.format)
    .option('--output-dir <dir>', 'Directory for CSV reports', CONFIG.output.reportsDir)
    .action(async (modelFile: string, options: unknown) => {
      try {
        const validated = validate(ComponentsOptionsSchema, options, 'command options');
        await executeReport({
          modelPath: modelFile,
          report: 'component-services',
          format: validated.format,
          outputDir: validated.outputDir,
        });
      } catch (error) {
        ErrorHandler.handleCliError(error);
      }
    });
}
