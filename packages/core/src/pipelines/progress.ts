/**
 * Progress reporting for the report pipeline.
 *
 * The CLI passes a chalk-backed reporter for file exports and the silent one
 * when the report itself goes to stdout.
 */
export interface ProgressReporter {
  section(title: string): void;
  start(message: string): void;
  succeed(message: string): void;
  fail(message: string): void;
  warn(message: string): void;
  info(message: string): void;
}

export class SilentProgress implements ProgressReporter {
  section(_title: string): void {
    /* noop */
  }
  start(_message: string): void {
    /* noop */
  }
  succeed(_message: string): void {
    /* noop */
  }
  fail(_message: string): void {
    /* noop */
  }
  warn(_message: string): void {
    /* noop */
  }
  info(_message: string): void {
    /* noop */
  }
}
