/**
 * CameraFormat - resolution, encoding and frame rate of a capture mode
 */

import { Resolution } from '../types/geometry.js';
import { validateNonNegativeInteger } from '../utils/validation.js';
import type { FrameFormat } from './frame-formats.js';

export interface CameraFormatInit {
  resolution: Resolution;
  format: FrameFormat;
  frameRate: number;
}

export class CameraFormat {
  private _resolution: Resolution;
  private _format: FrameFormat;
  private _frameRate: number;

  constructor(init: CameraFormatInit) {
    this._resolution = init.resolution;
    this._format = init.format;
    this._frameRate = validateNonNegativeInteger(init.frameRate, 'frameRate');
  }

  /**
   * 640x480 MJPEG at 15 FPS
   */
  static default(): CameraFormat {
    return new CameraFormat({
      resolution: new Resolution(640, 480),
      format: 'MJPEG',
      frameRate: 15,
    });
  }

  static fromSize(width: number, height: number, format: FrameFormat, frameRate: number): CameraFormat {
    return new CameraFormat({ resolution: new Resolution(width, height), format, frameRate });
  }

  get resolution(): Resolution {
    return this._resolution;
  }

  set resolution(value: Resolution) {
    this._resolution = value;
  }

  get width(): number {
    return this._resolution.width;
  }

  get height(): number {
    return this._resolution.height;
  }

  get format(): FrameFormat {
    return this._format;
  }

  set format(value: FrameFormat) {
    this._format = value;
  }

  get frameRate(): number {
    return this._frameRate;
  }

  set frameRate(value: number) {
    this._frameRate = validateNonNegativeInteger(value, 'frameRate');
  }

  equals(other: CameraFormat): boolean {
    return (
      this._resolution.equals(other._resolution) &&
      this._format === other._format &&
      this._frameRate === other._frameRate
    );
  }

  toString(): string {
    return `${this._resolution.toString()}@${this._frameRate}FPS, ${this._format} Format`;
  }

  toJSON(): { resolution: { width: number; height: number }; format: FrameFormat; frameRate: number } {
    return {
      resolution: this._resolution.toJSON(),
      format: this._format,
      frameRate: this._frameRate,
    };
  }
}
