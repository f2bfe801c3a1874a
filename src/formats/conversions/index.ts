/**
 * Format conversions
 */

export { yuyv444ToRgb888 } from '../color-space.js';

export {
  yuyv422ToRgb888,
  rgbaToRgb888,
  rgb888ToRgba8888,
  decodeFrameToRgb888,
} from './frame-converter.js';

export { mjpegToRgb888, type DecodedImage } from './mjpeg.js';
