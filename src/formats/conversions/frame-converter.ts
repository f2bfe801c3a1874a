/**
 * Frame format conversion utilities
 *
 * Standalone functions over packed pixel buffers. Each allocates exactly one
 * output buffer and checks the input length before reading any byte.
 */

import { ProcessFrameError } from '../../types/errors.js';
import { yuyv444ToRgb888 } from '../color-space.js';
import type { RawFrame } from '../frame-formats.js';
import { getFrameBufferSize, type PixelBuffer } from '../pixel-formats.js';
import { mjpegToRgb888 } from './mjpeg.js';

/**
 * Convert packed YUYV 4:2:2 to RGB888.
 *
 * Each 4-byte group Y0 U Y1 V yields two pixels sharing U and V.
 */
export function yuyv422ToRgb888(data: Uint8Array): Uint8Array {
  if (data.length % 4 !== 0) {
    throw new ProcessFrameError(
      'YUYV',
      'RGB888',
      "Assertion failure, the YUV stream isn't 4:2:2! (wrong number of bytes)"
    );
  }

  const out = new Uint8Array((data.length / 4) * 6);
  let o = 0;
  for (let i = 0; i < data.length; i += 4) {
    const y0 = data[i];
    const u = data[i + 1];
    const y1 = data[i + 2];
    const v = data[i + 3];

    const [r0, g0, b0] = yuyv444ToRgb888(y0, u, v);
    const [r1, g1, b1] = yuyv444ToRgb888(y1, u, v);

    out[o++] = r0;
    out[o++] = g0;
    out[o++] = b0;
    out[o++] = r1;
    out[o++] = g1;
    out[o++] = b1;
  }
  return out;
}

/**
 * Drop the alpha channel of packed RGBA
 */
export function rgbaToRgb888(data: Uint8Array | Uint8ClampedArray): Uint8Array {
  if (data.length % 4 !== 0) {
    throw new ProcessFrameError('RGBA8888', 'RGB888', `Length ${data.length} is not a multiple of 4`);
  }

  const pixels = data.length / 4;
  const out = new Uint8Array(pixels * 3);
  for (let i = 0; i < pixels; i++) {
    out[i * 3] = data[i * 4];
    out[i * 3 + 1] = data[i * 4 + 1];
    out[i * 3 + 2] = data[i * 4 + 2];
  }
  return out;
}

/**
 * Expand packed RGB to RGBA with opaque alpha
 */
export function rgb888ToRgba8888(data: Uint8Array): Uint8Array {
  if (data.length % 3 !== 0) {
    throw new ProcessFrameError('RGB888', 'RGBA8888', `Length ${data.length} is not a multiple of 3`);
  }

  const pixels = data.length / 3;
  const out = new Uint8Array(pixels * 4);
  for (let i = 0; i < pixels; i++) {
    out[i * 4] = data[i * 3];
    out[i * 4 + 1] = data[i * 3 + 1];
    out[i * 4 + 2] = data[i * 3 + 2];
    out[i * 4 + 3] = 255;
  }
  return out;
}

/**
 * Decode a backend frame to RGB888, choosing the decoder by its format
 */
export async function decodeFrameToRgb888(frame: RawFrame): Promise<PixelBuffer> {
  switch (frame.format) {
    case 'YUYV': {
      const { width, height } = frame.resolution;
      const data = yuyv422ToRgb888(frame.data);
      const expected = getFrameBufferSize('RGB888', width, height);
      if (data.length !== expected) {
        throw new ProcessFrameError(
          'YUYV',
          'RGB888',
          `Decoded ${data.length} bytes, expected ${expected} for ${frame.resolution.toString()}`
        );
      }
      return { data, format: 'RGB888', width, height };
    }
    case 'MJPEG': {
      const decoded = await mjpegToRgb888(frame.data);
      return { data: decoded.data, format: 'RGB888', width: decoded.width, height: decoded.height };
    }
    default: {
      const unhandled: never = frame.format;
      throw new ProcessFrameError(String(unhandled), 'RGB888', 'Unsupported frame format');
    }
  }
}
