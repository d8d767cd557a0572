export enum ErrorCode {
  CONFIG_INVALID = 'CONFIG_INVALID',
  INPUT_INVALID = 'INPUT_INVALID',
  IO_FILE_NOT_FOUND = 'IO_FILE_NOT_FOUND',
  IO_WRITE_FAILED = 'IO_WRITE_FAILED',
  MODEL_PARSE_FAILED = 'MODEL_PARSE_FAILED',
  MODEL_NOT_LOADED = 'MODEL_NOT_LOADED',
  INTERNAL_UNKNOWN = 'INTERNAL_UNKNOWN',
}
type ErrorContext = Record<string, string | number | boolean | null | undefined>;
export class ArchiReportError extends Error {
  public readonly code: ErrorCode;
  public readonly userMessage: string;
  public readonly context: ErrorContext;
  public readonly recoverable: boolean;
  constructor(
    message: string,
    code: ErrorCode,
    userMessage?: string,
    context: ErrorContext = {},
    recoverable = false
  ) {
    super(message);
    this.name = 'ArchiReportError';
    this.code = code;
    this.userMessage = userMessage ?? message;
    this.context = context;
    this.recoverable = recoverable;
    Error.captureStackTrace(this, ArchiReportError);
  }
  static fromError(
    error: unknown,
    code = ErrorCode.INTERNAL_UNKNOWN,
    userMessage?: string
  ): ArchiReportError {
    if (error instanceof ArchiReportError) return error;
    const message = error instanceof Error ? error.message : String(error);
    const context = error instanceof Error ? { originalError: error.name } : {};
    return new ArchiReportError(message, code, userMessage, context);
  }
}
export class ConfigurationError extends ArchiReportError {
  constructor(message: string, configKey?: string) {
    super(
      message,
      ErrorCode.CONFIG_INVALID,
      `Configuration issue: ${message}`,
      { configKey },
      false
    );
    this.name = 'ConfigurationError';
  }
}
type AnalyzerFormat = 'archimate';
export class AnalyzerError extends ArchiReportError {
  public readonly analyzerFormat: AnalyzerFormat;
  public readonly suggestions?: string[];
  constructor(
    message: string,
    code: ErrorCode,
    analyzerFormat: AnalyzerFormat,
    userMessage?: string,
    context: ErrorContext = {},
    suggestions?: string[]
  ) {
    super(message, code, userMessage, { ...context, analyzerFormat }, false);
    this.name = 'AnalyzerError';
    this.analyzerFormat = analyzerFormat;
    this.suggestions = suggestions;
  }
  static notLoaded(analyzerFormat: AnalyzerFormat): AnalyzerError {
    return new AnalyzerError(
      'Model not loaded',
      ErrorCode.MODEL_NOT_LOADED,
      analyzerFormat,
      'The model must be parsed before it can be analyzed. Call parse() first.'
    );
  }
  static override fromError(
    error: unknown,
    analyzerFormat: AnalyzerFormat = 'archimate',
    displayName = 'ArchiMate',
    suggestions?: string[]
  ): AnalyzerError {
    if (error instanceof AnalyzerError) {
      return error;
    }
    if (error instanceof Error) {
      return new AnalyzerError(
        error.message,
        ErrorCode.MODEL_PARSE_FAILED,
        analyzerFormat,
        `Could not read ${displayName} model: ${error.message}`,
        { originalError: error.name },
        suggestions
      );
    }
    return new AnalyzerError(
      String(error),
      ErrorCode.MODEL_PARSE_FAILED,
      analyzerFormat,
      `Could not read ${displayName} model: ${String(error)}`,
      {},
      suggestions
    );
  }
}

/** Raised when a model document is not well formed or lacks its `<model>` root. */
export class ModelParseError extends AnalyzerError {
  public readonly line?: number;
  public readonly column?: number;
  constructor(
    message: string,
    position: { line?: number; column?: number } = {},
    suggestions?: string[]
  ) {
    super(
      message,
      ErrorCode.MODEL_PARSE_FAILED,
      'archimate',
      `Could not parse model document: ${message}`,
      { line: position.line, column: position.column },
      suggestions
    );
    this.name = 'ModelParseError';
    this.line = position.line;
    this.column = position.column;
  }
}
