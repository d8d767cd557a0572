import chalk from 'chalk';
import type { ProgressReporter } from '@archi-reports/core';

class ConsoleProgress implements ProgressReporter {
  section(title: string): void {
    console.log('\n' + chalk.bold.cyan(`── ${title} ──`));
  }
  start(message: string): void {
    console.log(chalk.cyan(`🔄 ${message}...`));
  }
  succeed(message: string): void {
    console.log(chalk.green(`✓ ${message}`));
  }
  fail(message: string): void {
    console.error(chalk.red(`❌ ${message}`));
  }
  warn(message: string): void {
    console.warn(chalk.yellow(`⚠️  ${message}`));
  }
  info(message: string): void {
    console.log(chalk.blue(`ℹ️  ${message}`));
  }
}

export const Logger = {
  fail(message: string): void {
    console.error(chalk.red(`❌ ${message}`));
  },
  warn(message: string): void {
    console.warn(chalk.yellow(`⚠️  ${message}`));
  },
  info(message: string): void {
    console.log(chalk.blue(`ℹ️  ${message}`));
  },
  success(message: string): void {
    console.log(chalk.green(`✓ ${message}`));
  },
} as const;

export function createProgress(): ProgressReporter {
  return new ConsoleProgress();
}
