#!/usr/bin/env node
import { Command } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { PackageJsonSchema, validate } from '@archi-reports/core';
import { Logger } from './utils/cli-helpers.js';
import { ErrorHandler } from './utils/error-handler.js';
import { createProcessesCommand } from './commands/processes.js';
import { createComponentsCommand } from './commands/components.js';
import { createReportCommand } from './commands/report.js';

function setupSignalHandlers(): void {
  const handleShutdown = (signal: string) => {
    Logger.warn(`Received ${signal}, shutting down...`);
    process.exit(0);
  };
  process.on('SIGINT', () => handleShutdown('SIGINT'));
  process.on('SIGTERM', () => handleShutdown('SIGTERM'));
  process.on('uncaughtException', (error) => {
    Logger.fail('Uncaught Exception:');
    console.error(error);
    process.exit(1);
  });
}

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Read the CLI package's own version
const packageJson = validate(
  PackageJsonSchema,
  JSON.parse(readFileSync(join(__dirname, '../package.json'), 'utf-8')),
  'PackageJson'
);

setupSignalHandlers();

const program = new Command();
program
  .name('archi-reports')
  .description('Served and unserved business process reports for ArchiMate models')
  .version(packageJson.version);

program.addCommand(createProcessesCommand());
program.addCommand(createComponentsCommand());
program.addCommand(createReportCommand());

program.parseAsync().catch((error: unknown) => {
  ErrorHandler.handleCliError(error);
});
