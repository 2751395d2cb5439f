/**
 * Multibyte frequency scoring for JIS / Shift_JIS / EUC-JP
 *
 * Every overlapping 2-byte window is decoded under each charset. A window
 * that decodes to a single non-surrogate character is a hit; the charset
 * with the most hits is the best guess.
 *
 * ISO-2022-JP is stateful: a window is decoded behind the designation escape
 * sequence in effect at its offset, so two-byte JIS X 0208 text between
 * `ESC $ B` and `ESC ( B` counts the same way Shift_JIS or EUC-JP pairs do.
 */

import {
  LEGACY_CHARSETS,
  REPLACEMENT_CHARACTER,
  defaultCharsetDecoder,
  isSurrogate,
  matchIso2022Designation,
  type CharsetDecoder,
  type LegacyCharset,
} from './charset-decoder.js';
import { getErrorMessage } from '../errors/index.js';
import { logger } from '../utils/logger.js';

export type WindowOutcome =
  | { kind: 'hit' }
  | { kind: 'miss' }
  // the decoder failed outright: the buffer cannot be in this charset
  | { kind: 'non-match'; error: unknown };

export type CharsetScores = Record<LegacyCharset, number>;

const HIT: WindowOutcome = { kind: 'hit' };
const MISS: WindowOutcome = { kind: 'miss' };

export function classifyWindow(
  decoder: CharsetDecoder,
  charset: LegacyCharset,
  bytes: Uint8Array
): WindowOutcome {
  let decoded: string;
  try {
    decoded = decoder.decode(charset, bytes);
  } catch (error) {
    return { kind: 'non-match', error };
  }

  if (decoded.length !== 1 || decoded === REPLACEMENT_CHARACTER) {
    return MISS;
  }
  return isSurrogate(decoded.charCodeAt(0)) ? MISS : HIT;
}

function windowBytes(prefix: readonly number[], b1: number, b2: number): Uint8Array {
  const bytes = new Uint8Array(prefix.length + 2);
  bytes.set(prefix);
  bytes[prefix.length] = b1;
  bytes[prefix.length + 1] = b2;
  return bytes;
}

/**
 * Number of 2-byte windows that decode to one character under `charset`.
 * Drops to 0 as soon as the decoder fails outright.
 */
export function countInCharset(
  buffer: Uint8Array,
  charset: LegacyCharset,
  decoder: CharsetDecoder = defaultCharsetDecoder
): number {
  let count = 0;
  let designation: readonly number[] = [];
  let pending: { bytes: readonly number[]; from: number } | undefined;

  for (let i = 0; i < buffer.length - 1; i++) {
    if (charset === 'iso-2022-jp') {
      if (pending && i >= pending.from) {
        designation = pending.bytes;
        pending = undefined;
      }
      const escape = matchIso2022Designation(buffer, i);
      if (escape) {
        pending = { bytes: escape, from: i + escape.length };
      }
    }

    const outcome = classifyWindow(decoder, charset, windowBytes(designation, buffer[i], buffer[i + 1]));

    if (outcome.kind === 'non-match') {
      logger.debug(`Decoding failed, ruling out ${charset}`, {
        offset: i,
        error: getErrorMessage(outcome.error),
      });
      return 0;
    }
    if (outcome.kind === 'hit') {
      count++;
    }
  }

  return count;
}

export function scoreLegacyCharsets(
  buffer: Uint8Array,
  decoder: CharsetDecoder = defaultCharsetDecoder
): CharsetScores {
  return {
    'iso-2022-jp': countInCharset(buffer, 'iso-2022-jp', decoder),
    shift_jis: countInCharset(buffer, 'shift_jis', decoder),
    'euc-jp': countInCharset(buffer, 'euc-jp', decoder),
  };
}

/**
 * Highest-scoring charset. Ties go to the charset listed first in
 * LEGACY_CHARSETS; returns undefined when nothing scored.
 */
export function pickLegacyCharset(scores: CharsetScores): LegacyCharset | undefined {
  let best: LegacyCharset | undefined;
  let bestCount = 0;

  for (const charset of LEGACY_CHARSETS) {
    if (scores[charset] > bestCount) {
      best = charset;
      bestCount = scores[charset];
    }
  }

  return best;
}
