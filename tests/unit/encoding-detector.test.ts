/**
 * Unit tests for the detection cascade
 */

import { detectEncoding } from '../../src/encoding/detector';
import type { CharsetDecoder, LegacyCharset } from '../../src/encoding/charset-decoder';
import {
  ASCII,
  EUC_JP,
  ISO_2022_JP,
  SHIFT_JIS,
  UTF16_BE,
  UTF16_LE,
  UTF32_BE,
  UTF32_LE,
  UTF7,
  UTF8_BOM,
  UTF8_NO_BOM,
} from '../../src/encoding/types';

jest.mock('../../src/utils/logger.js', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const bytes = (...values: number[]) => Uint8Array.from(values);

/** Records every call and answers from a per-charset table */
function createFakeDecoder(answers: Partial<Record<LegacyCharset, string>> = {}) {
  const calls: Array<{ charset: LegacyCharset; bytes: number[] }> = [];
  const decoder: CharsetDecoder = {
    decode(charset, input) {
      calls.push({ charset, bytes: Array.from(input) });
      return answers[charset] ?? 'ab';
    },
  };
  return { decoder, calls };
}

describe('detectEncoding', () => {
  describe('byte order marks', () => {
    it('detects UTF-8 with BOM regardless of trailing bytes', () => {
      expect(detectEncoding(bytes(0xef, 0xbb, 0xbf))).toEqual(UTF8_BOM);
      expect(detectEncoding(bytes(0xef, 0xbb, 0xbf, 0xff, 0x00, 0xe3))).toEqual(UTF8_BOM);
    });

    it('detects UTF-16 big-endian', () => {
      expect(detectEncoding(bytes(0xfe, 0xff))).toEqual(UTF16_BE);
      expect(detectEncoding(bytes(0xfe, 0xff, 0x00, 0x41))).toEqual(UTF16_BE);
    });

    it('detects UTF-16 little-endian when the UTF-32 mark does not match', () => {
      expect(detectEncoding(bytes(0xff, 0xfe, 0x41, 0x00))).toEqual(UTF16_LE);
      expect(detectEncoding(bytes(0xff, 0xfe))).toEqual(UTF16_LE);
    });

    it('detects UTF-32 big-endian', () => {
      expect(detectEncoding(bytes(0x00, 0x00, 0xfe, 0xff))).toEqual(UTF32_BE);
    });

    it('detects UTF-32 little-endian instead of UTF-16 little-endian', () => {
      expect(detectEncoding(bytes(0xff, 0xfe, 0x00, 0x00))).toEqual(UTF32_LE);
      expect(detectEncoding(bytes(0xff, 0xfe, 0x00, 0x00, 0x41, 0x00, 0x00, 0x00))).toEqual(UTF32_LE);
    });
  });

  describe('UTF-7 signature', () => {
    it.each([0x38, 0x39, 0x2b, 0x2f])('detects +/v followed by byte %d', (fourth) => {
      expect(detectEncoding(bytes(0x2b, 0x2f, 0x76, fourth, 0x41))).toEqual(UTF7);
    });

    it('ignores +/v followed by another byte', () => {
      expect(detectEncoding(bytes(0x2b, 0x2f, 0x76, 0x41))).toEqual(ASCII);
    });
  });

  describe('UTF-8 without BOM', () => {
    it('accepts valid multi-byte sequences without reaching the charset scorer', () => {
      const { decoder, calls } = createFakeDecoder({ shift_jis: 'x' });
      const hiragana = bytes(0xe3, 0x81, 0x82, 0xe3, 0x81, 0x82, 0xe3, 0x81, 0x82);

      expect(detectEncoding(hiragana, { decoder })).toEqual(UTF8_NO_BOM);
      expect(calls).toHaveLength(0);
    });

    it('steps over stray high bytes instead of scoring them', () => {
      const { decoder, calls } = createFakeDecoder({ 'euc-jp': 'x' });

      expect(detectEncoding(bytes(0xa4, 0xa2), { decoder })).toEqual(UTF8_NO_BOM);
      expect(detectEncoding(bytes(0xf8, 0xf9), { decoder })).toEqual(UTF8_NO_BOM);
      expect(detectEncoding(bytes(0x82, 0xa0, 0x41), { decoder })).toEqual(UTF8_NO_BOM);
      expect(calls).toHaveLength(0);
    });

    it('falls through to the scorer on a truncated trailing sequence', () => {
      const { decoder, calls } = createFakeDecoder({ shift_jis: 'x' });

      expect(detectEncoding(bytes(0xe3, 0x81, 0x82, 0xe3), { decoder })).toEqual(SHIFT_JIS);
      expect(calls.length).toBeGreaterThan(0);
    });
  });

  describe('ASCII', () => {
    it('detects printable 7-bit text', () => {
      const text = Uint8Array.from(Buffer.from('Hello, world!\r\n', 'latin1'));
      expect(detectEncoding(text)).toEqual(ASCII);
    });

    it('does not treat ESC as ASCII', () => {
      expect(detectEncoding(bytes(0x1b))).toEqual(UTF8_NO_BOM);
    });
  });

  describe('legacy Japanese charsets', () => {
    it('detects Shift_JIS text', () => {
      // 日本語
      expect(detectEncoding(bytes(0x93, 0xfa, 0x96, 0x7b, 0x8c, 0xea))).toEqual(SHIFT_JIS);
    });

    it('detects EUC-JP text', () => {
      // 日本語
      expect(detectEncoding(bytes(0xc6, 0xfc, 0xcb, 0xdc, 0xb8, 0xec))).toEqual(EUC_JP);
    });

    it('detects ISO-2022-JP text', () => {
      // ESC $ B 亜 ESC ( B
      expect(detectEncoding(bytes(0x1b, 0x24, 0x42, 0x30, 0x21, 0x1b, 0x28, 0x42))).toEqual(ISO_2022_JP);
    });

    it('breaks ties in JIS, Shift_JIS, EUC-JP order', () => {
      const { decoder } = createFakeDecoder({ 'iso-2022-jp': 'x', shift_jis: 'x', 'euc-jp': 'x' });
      expect(detectEncoding(bytes(0xc3, 0x41, 0x42), { decoder })).toEqual(ISO_2022_JP);
    });

    it('prefers Shift_JIS over EUC-JP on equal counts', () => {
      const { decoder } = createFakeDecoder({ shift_jis: 'x', 'euc-jp': 'x' });
      expect(detectEncoding(bytes(0xc3, 0x41, 0x42), { decoder })).toEqual(SHIFT_JIS);
    });

    it('rules out a charset whose decoder fails', () => {
      const decoder: CharsetDecoder = {
        decode(charset) {
          if (charset === 'iso-2022-jp') {
            throw new RangeError('unsupported');
          }
          return charset === 'euc-jp' ? 'x' : 'ab';
        },
      };
      expect(detectEncoding(bytes(0xc3, 0x41, 0x42), { decoder })).toEqual(EUC_JP);
    });

    it('falls back to UTF-8 without BOM when nothing scores', () => {
      const { decoder } = createFakeDecoder();
      expect(detectEncoding(bytes(0xc3, 0x41, 0x42), { decoder })).toEqual(UTF8_NO_BOM);
    });
  });

  describe('totality', () => {
    it('returns UTF-8 without BOM for an empty buffer', () => {
      expect(detectEncoding(new Uint8Array(0))).toEqual(UTF8_NO_BOM);
    });

    it('returns a label for every single-byte buffer', () => {
      for (let value = 0; value <= 0xff; value++) {
        expect(() => detectEncoding(bytes(value))).not.toThrow();
      }
    });

    it('is deterministic', () => {
      const input = bytes(0x93, 0xfa, 0x96, 0x7b, 0x8c, 0xea);
      expect(detectEncoding(input)).toEqual(detectEncoding(input));
    });

    it('does not mutate the input', () => {
      const input = bytes(0xff, 0xfe, 0x41, 0x00);
      detectEncoding(input);
      expect(Array.from(input)).toEqual([0xff, 0xfe, 0x41, 0x00]);
    });
  });
});
