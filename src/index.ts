/**
 * Text encoding detection for buffers and files of unknown provenance.
 */

import { detectEncoding, type DetectOptions } from './encoding/detector.js';
import type { EncodingLabel } from './encoding/types.js';
import { detectFileEncoding, type FileDetectOptions } from './io/file-detection.js';

export * from './encoding/index.js';
export * from './io/index.js';
export * from './errors/index.js';
export { loadConfig, validateEnv, getEnvSummary, ENV_SCHEMA } from './config/index.js';
export type { DetectorConfig, LogLevel, LogFormat, EnvVarDef } from './config/index.js';
export { Logger, logger } from './utils/logger.js';

/**
 * Stateless detector facade for callers that prefer a service object.
 */
export const EncodingDetector = Object.freeze({
  detect(buffer: Uint8Array, options?: DetectOptions): EncodingLabel {
    return detectEncoding(buffer, options);
  },

  detectFile(filePath: string, options?: FileDetectOptions): Promise<EncodingLabel> {
    return detectFileEncoding(filePath, options);
  },
});
