/**
 * Strict UTF-8 validation for buffers without a BOM
 */

/**
 * Sequence length announced by a UTF-8 lead byte, or 0 when `byte` cannot
 * start a sequence (a continuation byte, or F8-FF).
 */
export function utf8SequenceLength(byte: number): 0 | 1 | 2 | 3 | 4 {
  if ((byte & 0x80) === 0) return 1;
  if ((byte & 0xe0) === 0xc0) return 2;
  if ((byte & 0xf0) === 0xe0) return 3;
  if ((byte & 0xf8) === 0xf0) return 4;
  return 0;
}

function isContinuation(byte: number): boolean {
  return (byte & 0xc0) === 0x80;
}

/**
 * Check that every multi-byte UTF-8 sequence in `data` is complete, with the
 * right number of `10xxxxxx` continuation bytes.
 *
 * Bytes that are not lead bytes (stray continuations, F8-FF) are stepped
 * over one at a time rather than rejected. Input without any byte above 0x7F
 * (including the empty buffer) is left to the ASCII check.
 */
export function isUtf8WithoutBom(data: Uint8Array): boolean {
  let sawHighByte = false;
  let i = 0;

  while (i < data.length) {
    const length = utf8SequenceLength(data[i]);

    if (length <= 1) {
      if (length === 0) sawHighByte = true;
      i++;
      continue;
    }

    if (i + length > data.length) {
      return false;
    }

    for (let k = 1; k < length; k++) {
      if (!isContinuation(data[i + k])) {
        return false;
      }
    }

    sawHighByte = true;
    i += length;
  }

  return sawHighByte;
}
