/**
 * Encoding labels produced by the detector
 */

export type Endianness = 'big' | 'little';

export type EncodingLabel =
  | { readonly kind: 'utf-8'; readonly bom: boolean }
  | { readonly kind: 'utf-16'; readonly endianness: Endianness }
  | { readonly kind: 'utf-32'; readonly endianness: Endianness }
  | { readonly kind: 'utf-7' }
  | { readonly kind: 'ascii' }
  | { readonly kind: 'iso-2022-jp' }
  | { readonly kind: 'shift_jis' }
  | { readonly kind: 'euc-jp' };

export type EncodingKind = EncodingLabel['kind'];

/** Name understood by iconv-lite and the WHATWG TextDecoder */
export type EncodingName =
  | 'utf-8'
  | 'utf-16be'
  | 'utf-16le'
  | 'utf-32be'
  | 'utf-32le'
  | 'utf-7'
  | 'ascii'
  | 'iso-2022-jp'
  | 'shift_jis'
  | 'euc-jp';

export const UTF8_BOM: EncodingLabel = Object.freeze({ kind: 'utf-8', bom: true });
export const UTF8_NO_BOM: EncodingLabel = Object.freeze({ kind: 'utf-8', bom: false });
export const UTF16_BE: EncodingLabel = Object.freeze({ kind: 'utf-16', endianness: 'big' });
export const UTF16_LE: EncodingLabel = Object.freeze({ kind: 'utf-16', endianness: 'little' });
export const UTF32_BE: EncodingLabel = Object.freeze({ kind: 'utf-32', endianness: 'big' });
export const UTF32_LE: EncodingLabel = Object.freeze({ kind: 'utf-32', endianness: 'little' });
export const UTF7: EncodingLabel = Object.freeze({ kind: 'utf-7' });
export const ASCII: EncodingLabel = Object.freeze({ kind: 'ascii' });
export const ISO_2022_JP: EncodingLabel = Object.freeze({ kind: 'iso-2022-jp' });
export const SHIFT_JIS: EncodingLabel = Object.freeze({ kind: 'shift_jis' });
export const EUC_JP: EncodingLabel = Object.freeze({ kind: 'euc-jp' });

/**
 * Codec name for a label. UTF-16/32 names carry the byte order; the UTF-8
 * name is the same with or without a BOM.
 */
export function encodingName(label: EncodingLabel): EncodingName {
  switch (label.kind) {
    case 'utf-16':
      return label.endianness === 'big' ? 'utf-16be' : 'utf-16le';
    case 'utf-32':
      return label.endianness === 'big' ? 'utf-32be' : 'utf-32le';
    default:
      return label.kind;
  }
}

/**
 * Human-readable description, e.g. `UTF-8 (BOM)` or `UTF-16 LE`
 */
export function describeEncoding(label: EncodingLabel): string {
  switch (label.kind) {
    case 'utf-8':
      return label.bom ? 'UTF-8 (BOM)' : 'UTF-8';
    case 'utf-16':
      return `UTF-16 ${label.endianness === 'big' ? 'BE' : 'LE'}`;
    case 'utf-32':
      return `UTF-32 ${label.endianness === 'big' ? 'BE' : 'LE'}`;
    case 'utf-7':
      return 'UTF-7';
    case 'ascii':
      return 'ASCII';
    case 'iso-2022-jp':
      return 'ISO-2022-JP (JIS)';
    case 'shift_jis':
      return 'Shift_JIS';
    case 'euc-jp':
      return 'EUC-JP';
  }
}

export function isSameEncoding(a: EncodingLabel, b: EncodingLabel): boolean {
  if (a.kind !== b.kind) return false;
  if (a.kind === 'utf-8' && b.kind === 'utf-8') return a.bom === b.bom;
  if ((a.kind === 'utf-16' && b.kind === 'utf-16') || (a.kind === 'utf-32' && b.kind === 'utf-32')) {
    return a.endianness === b.endianness;
  }
  return true;
}
