/**
 * Encoding module: detection of a buffer's text encoding, and decoding with it
 */

export * from './types.js';
export * from './signatures.js';
export * from './utf8-validator.js';
export * from './ascii-validator.js';
export * from './charset-decoder.js';
export * from './multibyte-scorer.js';
export * from './detector.js';
export * from './text-decoding.js';
