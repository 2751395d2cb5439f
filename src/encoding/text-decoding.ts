/**
 * Decode bytes with a detected encoding
 */

import iconv from 'iconv-lite';
import { TextDecoder } from 'util';
import { detectEncoding, type DetectOptions } from './detector.js';
import { encodingName, type EncodingLabel } from './types.js';

export interface DecodedText {
  encoding: EncodingLabel;
  text: string;
}

/**
 * Decode `buffer` as `label`. A leading BOM is not part of the text.
 */
export function decodeText(buffer: Uint8Array, label: EncodingLabel): string {
  const name = encodingName(label);

  if (name === 'iso-2022-jp') {
    return new TextDecoder(name).decode(buffer);
  }
  return iconv.decode(Buffer.from(buffer.buffer, buffer.byteOffset, buffer.byteLength), name, {
    stripBOM: true,
  });
}

export function detectAndDecode(buffer: Uint8Array, options: DetectOptions = {}): DecodedText {
  const encoding = detectEncoding(buffer, options);
  return { encoding, text: decodeText(buffer, encoding) };
}
