const ESC = 0x1b;

/**
 * True when no byte has its high bit set and none is ESC, which would
 * announce an ISO-2022 escape sequence.
 *
 * Plain 7-bit Unicode text passes this check too, so call it only once the
 * Unicode checks have failed.
 */
export function isAscii(buffer: Uint8Array): boolean {
  for (const byte of buffer) {
    if (byte === ESC || byte >= 0x80) {
      return false;
    }
  }
  return true;
}
