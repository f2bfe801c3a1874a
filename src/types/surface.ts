/**
 * Presentation surface types
 *
 * The minimal slice of a DOM document the capture session draws through.
 */

import type { MediaStreamLike } from './media.js';

export interface SurfaceElement {
  setAttribute(name: string, value: string): void;
  appendChild<T extends SurfaceElement>(child: T): T;
}

/**
 * An element that presents a media stream (a video element)
 */
export interface PresentationElement extends SurfaceElement {
  width: number;
  height: number;
  srcObject: MediaStreamLike | null;
}

export interface ImageDataLike {
  data: Uint8ClampedArray | Uint8Array;
  width: number;
  height: number;
}

export interface DrawingContext2D {
  drawImage(image: PresentationElement, dx: number, dy: number, dw: number, dh: number): void;
  getImageData(sx: number, sy: number, sw: number, sh: number): ImageDataLike;
}

export interface DrawingSurface {
  width: number;
  height: number;
  getContext(contextId: '2d'): unknown;
}

export interface RenderSurface {
  getElementById(id: string): SurfaceElement | null;
  createElement(tagName: 'video'): SurfaceElement;
  createCanvas(width: number, height: number): DrawingSurface;
}
