/**
 * Decoders for the legacy Japanese charsets
 *
 * Shift_JIS and EUC-JP go through iconv-lite. iconv-lite has no ISO-2022-JP
 * codec, so that one uses the WHATWG TextDecoder built into Node.
 */

import iconv from 'iconv-lite';
import { TextDecoder } from 'util';

export type LegacyCharset = 'iso-2022-jp' | 'shift_jis' | 'euc-jp';

/** Scoring order; earlier charsets win ties. */
export const LEGACY_CHARSETS: readonly LegacyCharset[] = ['iso-2022-jp', 'shift_jis', 'euc-jp'];

export const REPLACEMENT_CHARACTER = '\uFFFD';

export interface CharsetDecoder {
  /**
   * Decode `bytes` as `charset`. Malformed input yields U+FFFD; an error is
   * thrown only when the charset cannot be decoded at all.
   */
  decode(charset: LegacyCharset, bytes: Uint8Array): string;
}

const ESC = 0x1b;

/** Designation escape sequences understood by the ISO-2022-JP decoder */
export const ISO_2022_JP_DESIGNATIONS: readonly (readonly number[])[] = [
  [ESC, 0x28, 0x42], // ESC ( B  ASCII
  [ESC, 0x28, 0x4a], // ESC ( J  JIS X 0201 Roman
  [ESC, 0x28, 0x49], // ESC ( I  JIS X 0201 Katakana
  [ESC, 0x24, 0x40], // ESC $ @  JIS X 0208-1978
  [ESC, 0x24, 0x42], // ESC $ B  JIS X 0208-1983
];

/**
 * The designation escape sequence starting at `offset`, if there is one.
 */
export function matchIso2022Designation(buffer: Uint8Array, offset: number): readonly number[] | undefined {
  if (buffer[offset] !== ESC) return undefined;
  return ISO_2022_JP_DESIGNATIONS.find(seq =>
    offset + seq.length <= buffer.length && seq.every((byte, k) => buffer[offset + k] === byte)
  );
}

export function isSurrogate(codeUnit: number): boolean {
  return codeUnit >= 0xd800 && codeUnit <= 0xdfff;
}

/**
 * Default decoder. TextDecoder instances are created lazily and reused;
 * a runtime built without ICU data rejects `iso-2022-jp` with a RangeError.
 */
export class LegacyCharsetDecoder implements CharsetDecoder {
  private textDecoders = new Map<string, TextDecoder>();

  decode(charset: LegacyCharset, bytes: Uint8Array): string {
    if (charset === 'iso-2022-jp') {
      return this.getTextDecoder(charset).decode(bytes);
    }
    return iconv.decode(Buffer.from(bytes), charset);
  }

  private getTextDecoder(charset: string): TextDecoder {
    let decoder = this.textDecoders.get(charset);
    if (!decoder) {
      decoder = new TextDecoder(charset);
      this.textDecoders.set(charset, decoder);
    }
    return decoder;
  }
}

export const defaultCharsetDecoder: CharsetDecoder = new LegacyCharsetDecoder();
