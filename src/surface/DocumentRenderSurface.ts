/**
 * RenderSurface over a DOM document
 */

import { StructureError } from '../types/errors.js';
import type { DrawingSurface, RenderSurface, SurfaceElement } from '../types/surface.js';
import { isDrawingSurface } from '../utils/type-guards.js';

/**
 * The parts of `document` the capture session uses
 */
export interface DocumentLike {
  getElementById(id: string): SurfaceElement | null;
  createElement(tagName: string): SurfaceElement;
}

export class DocumentRenderSurface implements RenderSurface {
  private readonly _document: DocumentLike;

  constructor(document: DocumentLike) {
    this._document = document;
  }

  getElementById(id: string): SurfaceElement | null {
    return this._document.getElementById(id);
  }

  createElement(tagName: 'video'): SurfaceElement {
    return this._document.createElement(tagName);
  }

  createCanvas(width: number, height: number): DrawingSurface {
    const canvas: unknown = this._document.createElement('canvas');
    if (!isDrawingSurface(canvas)) {
      throw new StructureError('HtmlCanvasElement', 'Cannot Cast');
    }
    canvas.width = width;
    canvas.height = height;
    return canvas;
  }
}
