/**
 * Type guards for checking host objects at runtime
 */

import type { PixelBuffer } from '../formats/pixel-formats.js';
import type {
  DrawingContext2D,
  DrawingSurface,
  ImageDataLike,
  PresentationElement,
} from '../types/surface.js';

/**
 * A stream that can hand out its most recent decoded RGBA frame
 */
export interface FrameProvider {
  currentFrame(): PixelBuffer | null;
}

/**
 * Check if object is ImageData-like (has data, width, height)
 */
export function isImageDataLike(obj: unknown): obj is ImageDataLike {
  if (!obj || typeof obj !== 'object') return false;
  const o = obj as Record<string, unknown>;
  return (
    (o.data instanceof Uint8ClampedArray || o.data instanceof Uint8Array) &&
    typeof o.width === 'number' &&
    typeof o.height === 'number'
  );
}

/**
 * Check if object is a canvas-like object with getContext
 */
export function isDrawingSurface(obj: unknown): obj is DrawingSurface {
  if (!obj || typeof obj !== 'object') return false;
  const o = obj as Record<string, unknown>;
  return (
    typeof o.width === 'number' &&
    typeof o.height === 'number' &&
    typeof o.getContext === 'function'
  );
}

export function isDrawingContext2D(obj: unknown): obj is DrawingContext2D {
  if (!obj || typeof obj !== 'object') return false;
  const o = obj as Record<string, unknown>;
  return typeof o.drawImage === 'function' && typeof o.getImageData === 'function';
}

/**
 * Check if an element can present a stream (video-element shape)
 */
export function isPresentationElement(obj: unknown): obj is PresentationElement {
  if (!obj || typeof obj !== 'object') return false;
  const o = obj as Record<string, unknown>;
  return (
    'srcObject' in o &&
    typeof o.width === 'number' &&
    typeof o.height === 'number' &&
    typeof o.setAttribute === 'function' &&
    typeof o.appendChild === 'function'
  );
}

export function isFrameProvider(obj: unknown): obj is FrameProvider {
  if (!obj || typeof obj !== 'object') return false;
  const o = obj as Record<string, unknown>;
  return typeof o.currentFrame === 'function';
}
