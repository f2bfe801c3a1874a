/**
 * Headless canvas with a minimal 2D context
 *
 * drawImage() paints the current frame of a video element's stream when that
 * stream is a FrameProvider, with nearest-neighbor scaling clipped to the
 * canvas. Like a browser, a video with no frame yet draws nothing.
 */

import { rgb888ToRgba8888 } from '../formats/conversions/frame-converter.js';
import { DOMException } from '../types/common.js';
import type { DrawingContext2D, PresentationElement } from '../types/surface.js';
import { createLogger } from '../utils/logger.js';
import { isFrameProvider } from '../utils/type-guards.js';
import { validateNonNegativeInteger } from '../utils/validation.js';
import { HeadlessElement } from './HeadlessElement.js';
import { HeadlessImageData } from './HeadlessImageData.js';

const logger = createLogger('HeadlessCanvas');

export class HeadlessCanvas extends HeadlessElement {
  private _width: number;
  private _height: number;
  private _context: HeadlessCanvasContext2D | null = null;

  constructor(width = 300, height = 150) {
    super('canvas');
    this._width = validateNonNegativeInteger(width, 'width');
    this._height = validateNonNegativeInteger(height, 'height');
  }

  get width(): number {
    return this._width;
  }

  /** Resizing clears the bitmap, as in a browser */
  set width(value: number) {
    this._width = validateNonNegativeInteger(value, 'width');
    this._context?._reset();
  }

  get height(): number {
    return this._height;
  }

  set height(value: number) {
    this._height = validateNonNegativeInteger(value, 'height');
    this._context?._reset();
  }

  getContext(contextId: string): HeadlessCanvasContext2D | null {
    if (contextId === '2d') {
      if (!this._context) {
        this._context = new HeadlessCanvasContext2D(this);
      }
      return this._context;
    }
    return null;
  }
}

export class HeadlessCanvasContext2D implements DrawingContext2D {
  private _canvas: HeadlessCanvas;
  private _imageData: Uint8ClampedArray;

  constructor(canvas: HeadlessCanvas) {
    this._canvas = canvas;
    this._imageData = new Uint8ClampedArray(canvas.width * canvas.height * 4);
  }

  get canvas(): HeadlessCanvas {
    return this._canvas;
  }

  _reset(): void {
    this._imageData = new Uint8ClampedArray(this._canvas.width * this._canvas.height * 4);
  }

  drawImage(image: PresentationElement, dx: number, dy: number, dw: number, dh: number): void {
    const source = image.srcObject;
    if (!isFrameProvider(source)) {
      logger.debug('drawImage: element has no frame source');
      return;
    }
    const frame = source.currentFrame();
    if (!frame) {
      logger.debug('drawImage: no frame decoded yet');
      return;
    }

    const rgba = frame.format === 'RGBA8888' ? frame.data : rgb888ToRgba8888(frame.data);
    this._resizeNearest(rgba, frame.width, frame.height, Math.trunc(dx), Math.trunc(dy), Math.trunc(dw), Math.trunc(dh));
  }

  /**
   * Nearest-neighbor scale of an RGBA image into the canvas, clipped to its bounds
   */
  private _resizeNearest(
    sourceData: Uint8Array,
    sourceWidth: number,
    sourceHeight: number,
    destX: number,
    destY: number,
    destW: number,
    destH: number
  ): void {
    const canvasWidth = this._canvas.width;
    const canvasHeight = this._canvas.height;
    if (sourceWidth === 0 || sourceHeight === 0) return;

    for (let y = 0; y < destH; y++) {
      const ty = destY + y;
      if (ty < 0 || ty >= canvasHeight) continue;
      const srcY = Math.floor(y * sourceHeight / destH);

      for (let x = 0; x < destW; x++) {
        const tx = destX + x;
        if (tx < 0 || tx >= canvasWidth) continue;
        const srcX = Math.floor(x * sourceWidth / destW);

        const srcOffset = (srcY * sourceWidth + srcX) * 4;
        const dstOffset = (ty * canvasWidth + tx) * 4;

        this._imageData[dstOffset] = sourceData[srcOffset];
        this._imageData[dstOffset + 1] = sourceData[srcOffset + 1];
        this._imageData[dstOffset + 2] = sourceData[srcOffset + 2];
        this._imageData[dstOffset + 3] = sourceData[srcOffset + 3];
      }
    }
  }

  /**
   * Read a rectangle. Pixels outside the canvas read as transparent black.
   */
  getImageData(sx: number, sy: number, sw: number, sh: number): HeadlessImageData {
    if (!Number.isInteger(sw) || !Number.isInteger(sh) || sw <= 0 || sh <= 0) {
      throw new DOMException(`Invalid source size ${sw}x${sh}`, 'IndexSizeError');
    }

    const data = new Uint8ClampedArray(sw * sh * 4);
    const canvasWidth = this._canvas.width;
    const canvasHeight = this._canvas.height;

    for (let y = 0; y < sh; y++) {
      const cy = sy + y;
      if (cy < 0 || cy >= canvasHeight) continue;
      for (let x = 0; x < sw; x++) {
        const cx = sx + x;
        if (cx < 0 || cx >= canvasWidth) continue;
        const srcOffset = (cy * canvasWidth + cx) * 4;
        const dstOffset = (y * sw + x) * 4;
        data[dstOffset] = this._imageData[srcOffset];
        data[dstOffset + 1] = this._imageData[srcOffset + 1];
        data[dstOffset + 2] = this._imageData[srcOffset + 2];
        data[dstOffset + 3] = this._imageData[srcOffset + 3];
      }
    }

    return new HeadlessImageData(data, sw, sh);
  }

  clearRect(x: number, y: number, w: number, h: number): void {
    const canvasWidth = this._canvas.width;
    const canvasHeight = this._canvas.height;
    for (let py = Math.max(0, y); py < Math.min(canvasHeight, y + h); py++) {
      const start = (py * canvasWidth + Math.max(0, x)) * 4;
      const end = (py * canvasWidth + Math.min(canvasWidth, x + w)) * 4;
      if (end > start) {
        this._imageData.fill(0, start, end);
      }
    }
  }
}
