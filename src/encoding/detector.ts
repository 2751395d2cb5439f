/**
 * Encoding detection
 *
 * Runs the byte-pattern checks in a fixed order and stops at the first that
 * matches:
 *
 *   BOM -> UTF-7 signature -> UTF-8 (no BOM) -> ASCII -> JIS/Shift_JIS/EUC-JP
 *
 * When none applies the buffer is reported as UTF-8 without a BOM.
 */

import { isAscii } from './ascii-validator.js';
import { defaultCharsetDecoder, type CharsetDecoder, type LegacyCharset } from './charset-decoder.js';
import { pickLegacyCharset, scoreLegacyCharsets } from './multibyte-scorer.js';
import { isUtf7Signature, matchByteOrderMark } from './signatures.js';
import {
  ASCII,
  EUC_JP,
  ISO_2022_JP,
  SHIFT_JIS,
  UTF7,
  UTF8_NO_BOM,
  describeEncoding,
  type EncodingLabel,
} from './types.js';
import { isUtf8WithoutBom } from './utf8-validator.js';
import { logger } from '../utils/logger.js';

export interface DetectOptions {
  /** Decoder used to score the legacy Japanese charsets */
  decoder?: CharsetDecoder;
}

const LEGACY_LABELS: Record<LegacyCharset, EncodingLabel> = {
  'iso-2022-jp': ISO_2022_JP,
  shift_jis: SHIFT_JIS,
  'euc-jp': EUC_JP,
};

/**
 * Detect the encoding of `buffer`. Never throws; an empty buffer is UTF-8
 * without a BOM.
 */
export function detectEncoding(buffer: Uint8Array, options: DetectOptions = {}): EncodingLabel {
  const label = runCascade(buffer, options.decoder ?? defaultCharsetDecoder);
  logger.debug(`Detected ${describeEncoding(label)}`, { bytes: buffer.length });
  return label;
}

function runCascade(buffer: Uint8Array, decoder: CharsetDecoder): EncodingLabel {
  const bom = matchByteOrderMark(buffer);
  if (bom) return bom;

  if (isUtf7Signature(buffer)) return UTF7;
  if (isUtf8WithoutBom(buffer)) return UTF8_NO_BOM;
  // an empty buffer is not evidence of ASCII
  if (buffer.length > 0 && isAscii(buffer)) return ASCII;

  const scores = scoreLegacyCharsets(buffer, decoder);
  const charset = pickLegacyCharset(scores);
  logger.debug('Legacy charset scores', { ...scores });

  return charset ? LEGACY_LABELS[charset] : UTF8_NO_BOM;
}
