/**
 * RenderSurface backed by an in-memory element tree
 */

import type { RenderSurface } from '../types/surface.js';
import { HeadlessCanvas } from './HeadlessCanvas.js';
import { HeadlessElement, HeadlessVideoElement } from './HeadlessElement.js';

export class HeadlessRenderSurface implements RenderSurface {
  readonly body = new HeadlessElement('body');

  /**
   * Create an element with `id` under the body, for sessions to attach to
   */
  addContainer(id: string, tagName = 'div'): HeadlessElement {
    const container = this.createElement(tagName);
    container.id = id;
    return this.body.appendChild(container);
  }

  getElementById(id: string): HeadlessElement | null {
    if (id === '') return null;
    return this.body.findById(id);
  }

  createElement(tagName: string): HeadlessElement {
    switch (tagName.toLowerCase()) {
      case 'video':
        return new HeadlessVideoElement();
      case 'canvas':
        return new HeadlessCanvas();
      default:
        return new HeadlessElement(tagName);
    }
  }

  createCanvas(width: number, height: number): HeadlessCanvas {
    return new HeadlessCanvas(width, height);
  }
}
