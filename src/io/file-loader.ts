/**
 * File loading for detection entry points
 */

import * as fs from 'fs-extra';
import { types } from 'util';
import { loadConfig } from '../config/detector-config.js';
import { FileReadError, FileTooLargeError } from '../errors/index.js';
import { logger } from '../utils/logger.js';

export interface FileLoader {
  /** Read the whole file into memory. */
  readBytes(filePath: string): Promise<Uint8Array>;
}

export interface FsFileLoaderOptions {
  /** Largest accepted file in bytes; 0 disables the check. Defaults to ENCDETECT_MAX_FILE_BYTES. */
  maxFileBytes?: number;
}

export class FsFileLoader implements FileLoader {
  private readonly maxFileBytes: number;

  constructor(options: FsFileLoaderOptions = {}) {
    this.maxFileBytes = options.maxFileBytes ?? loadConfig().maxFileBytes;
  }

  async readBytes(filePath: string): Promise<Uint8Array> {
    let stat: fs.Stats;
    try {
      stat = await fs.stat(filePath);
    } catch (error) {
      throw toReadError(filePath, error);
    }

    if (this.maxFileBytes > 0 && stat.size > this.maxFileBytes) {
      throw new FileTooLargeError(filePath, stat.size, this.maxFileBytes);
    }

    try {
      const data = await fs.readFile(filePath);
      logger.debug(`Read ${data.length} bytes`, { filePath });
      return data;
    } catch (error) {
      throw toReadError(filePath, error);
    }
  }
}

// fs errors may come from another realm, where `instanceof Error` fails
function toReadError(filePath: string, error: unknown): FileReadError {
  if (types.isNativeError(error)) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return new FileReadError(filePath, { cause: error, context: code ? { code } : undefined });
  }
  return new FileReadError(filePath, { context: { reason: String(error) } });
}
