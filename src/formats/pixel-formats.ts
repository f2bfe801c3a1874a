/**
 * Decoded pixel layouts and buffer size helpers
 */

import type { FrameFormat } from './frame-formats.js';

export type PixelLayout = 'RGB888' | 'RGBA8888';

/**
 * A packed, decoded frame
 */
export interface PixelBuffer {
  data: Uint8Array;
  format: PixelLayout;
  width: number;
  height: number;
}

export function getBytesPerPixel(layout: PixelLayout): number {
  switch (layout) {
    case 'RGB888':
      return 3;
    case 'RGBA8888':
      return 4;
  }
}

/**
 * Calculate the byte length of a packed frame
 */
export function getFrameBufferSize(layout: PixelLayout, width: number, height: number): number {
  const size = width * height * getBytesPerPixel(layout);
  if (!Number.isSafeInteger(size)) {
    throw new RangeError(`${width}x${height} ${layout} frame is too large to allocate`);
  }
  return size;
}

/**
 * Byte length of an encoded frame, or null where it varies per frame
 */
export function getEncodedFrameSize(format: FrameFormat, width: number, height: number): number | null {
  switch (format) {
    case 'YUYV':
      // Y0 U Y1 V per pixel pair
      return width * height * 2;
    case 'MJPEG':
      return null;
  }
}
