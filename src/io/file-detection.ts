/**
 * Path-based entry points: load a file, then detect (and decode) it
 */

import { detectEncoding, type DetectOptions } from '../encoding/detector.js';
import { decodeText } from '../encoding/text-decoding.js';
import type { EncodingLabel } from '../encoding/types.js';
import { FsFileLoader, type FileLoader } from './file-loader.js';

export interface FileDetectOptions extends DetectOptions {
  loader?: FileLoader;
}

export interface TextFile {
  path: string;
  encoding: EncodingLabel;
  text: string;
}

/**
 * Detect the encoding of the file at `filePath`. Rejects only with the
 * loader's error; detection itself cannot fail.
 */
export async function detectFileEncoding(
  filePath: string,
  options: FileDetectOptions = {}
): Promise<EncodingLabel> {
  const loader = options.loader ?? new FsFileLoader();
  const bytes = await loader.readBytes(filePath);
  return detectEncoding(bytes, options);
}

export async function readTextFile(filePath: string, options: FileDetectOptions = {}): Promise<TextFile> {
  const loader = options.loader ?? new FsFileLoader();
  const bytes = await loader.readBytes(filePath);
  const encoding = detectEncoding(bytes, options);
  return { path: filePath, encoding, text: decodeText(bytes, encoding) };
}
