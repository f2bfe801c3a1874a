/**
 * Geometry types - frame resolution
 */

import { validateUint32 } from '../utils/validation.js';

export interface ResolutionInit {
  width: number;
  height: number;
}

/**
 * Resolution - immutable width/height pair in pixels, each side a u32.
 *
 * Ordered by width, then height, both ascending.
 */
export class Resolution {
  readonly width: number;
  readonly height: number;

  constructor(width = 0, height = 0) {
    this.width = validateUint32(width, 'width');
    this.height = validateUint32(height, 'height');
  }

  static compare(a: Resolution, b: Resolution): number {
    if (a.width !== b.width) {
      return a.width - b.width;
    }
    return a.height - b.height;
  }

  /**
   * True for 0x0, which stands for "no resolution requested"
   */
  isNull(): boolean {
    return this.width === 0 && this.height === 0;
  }

  compareTo(other: Resolution): number {
    return Resolution.compare(this, other);
  }

  equals(other: Resolution): boolean {
    return this.width === other.width && this.height === other.height;
  }

  toString(): string {
    return `${this.width}x${this.height}`;
  }

  toJSON(): ResolutionInit {
    return { width: this.width, height: this.height };
  }
}
