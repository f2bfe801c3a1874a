/**
 * In-memory element tree for headless rendering
 */

import { DOMException } from '../types/common.js';
import type { MediaStreamLike } from '../types/media.js';
import type { PresentationElement, SurfaceElement } from '../types/surface.js';

export class HeadlessElement implements SurfaceElement {
  readonly tagName: string;
  private _parent: HeadlessElement | null = null;
  private readonly _attributes = new Map<string, string>();
  private readonly _children: HeadlessElement[] = [];

  constructor(tagName: string) {
    this.tagName = tagName.toLowerCase();
  }

  get id(): string {
    return this._attributes.get('id') ?? '';
  }

  set id(value: string) {
    this._attributes.set('id', value);
  }

  get parent(): HeadlessElement | null {
    return this._parent;
  }

  get children(): readonly HeadlessElement[] {
    return this._children;
  }

  setAttribute(name: string, value: string): void {
    this._attributes.set(name.toLowerCase(), value);
  }

  getAttribute(name: string): string | null {
    return this._attributes.get(name.toLowerCase()) ?? null;
  }

  hasAttribute(name: string): boolean {
    return this._attributes.has(name.toLowerCase());
  }

  contains(other: HeadlessElement): boolean {
    if (other === this) return true;
    return this._children.some((child) => child.contains(other));
  }

  /**
   * Append (or move) a child. Returns the appended node.
   */
  appendChild<T extends SurfaceElement>(child: T): T {
    if (!(child instanceof HeadlessElement)) {
      throw new DOMException('Only headless elements can be appended', 'HierarchyRequestError');
    }
    if (child.contains(this)) {
      throw new DOMException('The new child is an ancestor of the parent', 'HierarchyRequestError');
    }

    child._parent?.removeChild(child);
    child._parent = this;
    this._children.push(child);
    return child;
  }

  removeChild(child: HeadlessElement): HeadlessElement {
    const index = this._children.indexOf(child);
    if (index === -1) {
      throw new DOMException('The node is not a child of this element', 'NotFoundError');
    }
    this._children.splice(index, 1);
    child._parent = null;
    return child;
  }

  /**
   * Depth-first search by id, including this element
   */
  findById(id: string): HeadlessElement | null {
    if (this.id === id) return this;
    for (const child of this._children) {
      const found = child.findById(id);
      if (found) return found;
    }
    return null;
  }
}

export class HeadlessVideoElement extends HeadlessElement implements PresentationElement {
  width = 0;
  height = 0;
  srcObject: MediaStreamLike | null = null;

  constructor() {
    super('video');
  }

  get autoplay(): boolean {
    return this.hasAttribute('autoplay');
  }

  get playsInline(): boolean {
    return this.hasAttribute('playsinline');
  }
}
