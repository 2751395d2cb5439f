/**
 * Base Error Class
 *
 * Foundation for all errors raised at the detector's boundary.
 */

export interface DetectorErrorOptions {
  cause?: Error;
  context?: Record<string, unknown>;
}

export class DetectorError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(code: string, message: string, options: DetectorErrorOptions = {}) {
    super(message);
    this.name = 'DetectorError';
    this.code = code;
    this.context = options.context;

    if (options.cause) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }
}
