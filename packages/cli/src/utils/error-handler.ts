import { ArchiReportError, AnalyzerError, ErrorCode } from '@archi-reports/core';
import { Logger } from './cli-helpers.js';

function provideSuggestions(error: ArchiReportError): void {
  const suggestions: Partial<Record<ErrorCode, string[]>> = {
    [ErrorCode.CONFIG_INVALID]: [
      'Check ARCHI_OUTPUT_FORMAT is one of console, csv, table',
      'Review the variables in your .env file',
    ],
    [ErrorCode.IO_FILE_NOT_FOUND]: [
      'Double-check the model file path',
      'Pass the file explicitly or set ARCHI_MODEL_FILE',
      'Confirm file permissions allow reading',
    ],
    [ErrorCode.IO_WRITE_FAILED]: [
      'Confirm the reports directory is writable',
      'Choose another directory with --output-dir or ARCHI_REPORTS_DIR',
    ],
    [ErrorCode.MODEL_NOT_LOADED]: [
      'Call parse() before analyze()',
      'This is a bug: the analyzer was used before a model was parsed',
    ],
  };
  let errorSuggestions = suggestions[error.code];
  if (error instanceof AnalyzerError && error.suggestions && error.suggestions.length > 0) {
    errorSuggestions = error.suggestions;
  }
  if (errorSuggestions && errorSuggestions.length > 0) {
    console.error('\n💡 Hints:');
    errorSuggestions.forEach((suggestion) => {
      Logger.info(`• ${suggestion}`);
    });
  }
}

export const ErrorHandler = {
  formatError(error: unknown): void {
    if (error instanceof ArchiReportError) {
      Logger.fail(error.userMessage);
      const details = Object.entries(error.context).filter(
        ([, value]) => value !== undefined && value !== null
      );
      if (details.length > 0) {
        console.error('   Extra details:');
        for (const [key, value] of details) {
          console.error(`   ${key}: ${String(value)}`);
        }
      }
      console.error(`   Code: ${error.code}`);
      provideSuggestions(error);
    } else if (error instanceof Error) {
      Logger.fail(error.message);
    } else {
      Logger.fail(`Something went wrong unexpectedly: ${String(error)}`);
    }
  },
  getExitCode(error: unknown): number {
    if (error instanceof ArchiReportError) {
      switch (error.code) {
        case ErrorCode.CONFIG_INVALID:
        case ErrorCode.INPUT_INVALID:
          return 2;
        case ErrorCode.IO_FILE_NOT_FOUND:
        case ErrorCode.IO_WRITE_FAILED:
          return 3;
        case ErrorCode.MODEL_PARSE_FAILED:
        case ErrorCode.MODEL_NOT_LOADED:
          return 4;
        default:
          return 1;
      }
    }
    return 1;
  },
  handleCliError(error: unknown): never {
    ErrorHandler.formatError(error);
    const exitCode = ErrorHandler.getExitCode(error);
    process.exit(exitCode);
  },
} as const;
