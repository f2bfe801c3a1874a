/**
 * MJPEG decoding using sharp
 */

import sharp from 'sharp';

import { getCaptureConfig } from '../../config/capture-config.js';
import { ProcessFrameError, describeError } from '../../types/errors.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('mjpeg');

export interface DecodedImage {
  data: Uint8Array;
  width: number;
  height: number;
}

/**
 * Decode one JPEG frame to packed RGB888.
 *
 * The decoder reports the dimensions; the output length must match them exactly.
 */
export async function mjpegToRgb888(data: Uint8Array): Promise<DecodedImage> {
  if (data.length < 2 || data[0] !== 0xff || data[1] !== 0xd8) {
    throw new ProcessFrameError('MJPEG', 'RGB888', 'Not a JPEG image: missing start-of-image marker');
  }

  const input = Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  let decoded: { data: Buffer; info: sharp.OutputInfo };
  try {
    const image = sharp(input, { failOn: getCaptureConfig().mjpegFailOn });
    const { format } = await image.metadata();
    if (format !== 'jpeg') {
      throw new Error(`input is ${format ?? 'an unknown format'}, not JPEG`);
    }
    decoded = await image
      .removeAlpha()
      .toColourspace('srgb')
      .raw()
      .toBuffer({ resolveWithObject: true });
  } catch (error) {
    logger.debug('JPEG decode failed', error);
    throw new ProcessFrameError(
      'MJPEG',
      'RGB888',
      `Failed to read JPEG scanlines into RGB888 pixels: ${describeError(error)}`
    );
  }

  const { width, height, channels } = decoded.info;
  const expected = width * height * 3;
  if (channels !== 3 || decoded.data.length !== expected) {
    throw new ProcessFrameError(
      'MJPEG',
      'RGB888',
      `Decoder returned ${decoded.data.length} bytes in ${channels} channels, expected ${expected}`
    );
  }

  return {
    data: new Uint8Array(decoded.data.buffer, decoded.data.byteOffset, decoded.data.length),
    width,
    height,
  };
}
