/**
 * Buffer and ArrayBuffer utilities
 */

import type { BufferSource } from '../types/common.js';

/**
 * View any BufferSource as a Uint8Array without copying
 */
export function toUint8Array(source: BufferSource): Uint8Array {
  if (source instanceof ArrayBuffer) {
    return new Uint8Array(source);
  } else if (ArrayBuffer.isView(source)) {
    return new Uint8Array(source.buffer, source.byteOffset, source.byteLength);
  }
  throw new TypeError('source must be an ArrayBuffer or ArrayBufferView');
}

