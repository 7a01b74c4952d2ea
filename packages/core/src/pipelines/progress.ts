/**
 * Progress reporting abstraction for pipeline functions.
 *
 * The CLI passes a stderr-backed reporter under `--verbose`; everything else gets SilentProgress.
 */
export interface ProgressReporter {
  start(message: string): void;
  succeed(message: string): void;
  warn(message: string): void;
  info(message: string): void;
}

/** No-op progress reporter — swallows every call silently. */
export class SilentProgress implements ProgressReporter {
  start(_message: string): void {
    /* noop */
  }
  succeed(_message: string): void {
    /* noop */
  }
  warn(_message: string): void {
    /* noop */
  }
  info(_message: string): void {
    /* noop */
  }
}
