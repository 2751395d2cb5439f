import { DetectorError } from './base-error.js';

/**
 * A file could not be read from disk.
 */
export class FileReadError extends DetectorError {
  public readonly filePath: string;

  constructor(filePath: string, options: { cause?: Error; context?: Record<string, unknown> } = {}) {
    const reason = options.cause ? `: ${options.cause.message}` : '';
    super('FILE_READ_ERROR', `Failed to read "${filePath}"${reason}`, {
      cause: options.cause,
      context: { filePath, ...options.context },
    });
    this.name = 'FileReadError';
    this.filePath = filePath;
  }
}

/**
 * File exceeds the configured size limit
 */
export class FileTooLargeError extends DetectorError {
  public readonly filePath: string;
  public readonly size: number;
  public readonly limit: number;

  constructor(filePath: string, size: number, limit: number) {
    super('FILE_TOO_LARGE', `File "${filePath}" is ${size} bytes, above the ${limit} byte limit`, {
      context: { filePath, size, limit },
    });
    this.name = 'FileTooLargeError';
    this.filePath = filePath;
    this.size = size;
    this.limit = limit;
  }
}
