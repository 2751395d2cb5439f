/**
 * Error types and helpers
 */

import { types } from 'util';
import { DetectorError } from './base-error.js';

export { DetectorError } from './base-error.js';
export type { DetectorErrorOptions } from './base-error.js';
export { FileReadError, FileTooLargeError } from './file-error.js';

/**
 * Check if error is a DetectorError
 */
export function isDetectorError(error: unknown): error is DetectorError {
  return error instanceof DetectorError;
}

/**
 * Safely extracts error message from any error type
 */
export function getErrorMessage(error: unknown): string {
  if (types.isNativeError(error)) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'An unknown error occurred';
}
