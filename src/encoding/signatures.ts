/**
 * Byte order mark and UTF-7 signature matching
 */

import {
  UTF16_BE,
  UTF16_LE,
  UTF32_BE,
  UTF32_LE,
  UTF8_BOM,
  isSameEncoding,
  type EncodingLabel,
} from './types.js';

export interface ByteSignature {
  readonly bytes: readonly number[];
  readonly label: EncodingLabel;
}

/**
 * Known byte order marks, longest first. `FF FE` opens both the UTF-16 LE
 * and the UTF-32 LE mark, so the 4-byte patterns must be tried first.
 */
export const BYTE_ORDER_MARKS: readonly ByteSignature[] = [
  { bytes: [0x00, 0x00, 0xfe, 0xff], label: UTF32_BE },
  { bytes: [0xff, 0xfe, 0x00, 0x00], label: UTF32_LE },
  { bytes: [0xef, 0xbb, 0xbf], label: UTF8_BOM },
  { bytes: [0xfe, 0xff], label: UTF16_BE },
  { bytes: [0xff, 0xfe], label: UTF16_LE },
].sort((a, b) => b.bytes.length - a.bytes.length);

const UTF7_PREFIX = [0x2b, 0x2f, 0x76] as const; // "+/v"
const UTF7_FOURTH_BYTES: ReadonlySet<number> = new Set([0x38, 0x39, 0x2b, 0x2f]); // 8 9 + /

export function startsWith(buffer: Uint8Array, pattern: readonly number[]): boolean {
  if (buffer.length < pattern.length) return false;
  for (let i = 0; i < pattern.length; i++) {
    if (buffer[i] !== pattern[i]) return false;
  }
  return true;
}

/**
 * Returns the label whose byte order mark opens `buffer`, if any.
 */
export function matchByteOrderMark(buffer: Uint8Array): EncodingLabel | undefined {
  return BYTE_ORDER_MARKS.find(signature => startsWith(buffer, signature.bytes))?.label;
}

/**
 * UTF-7 signature: `2B 2F 76` followed by one of `38`, `39`, `2B`, `2F`.
 */
export function isUtf7Signature(buffer: Uint8Array): boolean {
  return buffer.length >= 4 && startsWith(buffer, UTF7_PREFIX) && UTF7_FOURTH_BYTES.has(buffer[3]);
}

/**
 * BOM bytes written for `label`; empty for labels that carry none.
 */
export function getByteOrderMark(label: EncodingLabel): Uint8Array {
  const signature = BYTE_ORDER_MARKS.find(candidate => isSameEncoding(candidate.label, label));
  return signature ? Uint8Array.from(signature.bytes) : new Uint8Array(0);
}
