/**
 * FrameSourceStream - a MediaStream over an opened FrameSource device
 *
 * refresh() reads one encoded frame, decodes it and keeps it as the picture
 * the next drawImage() will paint. Once started, the stream keeps refreshing
 * at the device frame rate until its track stops, as a playing video does.
 */

import { getCaptureConfig } from '../config/capture-config.js';
import type { CameraControl } from '../controls/CameraControl.js';
import { decodeFrameToRgb888, rgb888ToRgba8888 } from '../formats/conversions/frame-converter.js';
import type { PixelBuffer } from '../formats/pixel-formats.js';
import { DOMException } from '../types/common.js';
import type {
  MediaStreamLike,
  MediaStreamTrackLike,
  MediaTrackSettingsLike,
} from '../types/media.js';
import { createLogger } from '../utils/logger.js';
import type { FrameProvider } from '../utils/type-guards.js';
import type { DeviceDescriptor, FrameSourceHandle } from './types.js';

const logger = createLogger('FrameSourceStream');

export class FrameSourceTrack implements MediaStreamTrackLike {
  readonly kind = 'video';
  private _readyState: 'live' | 'ended' = 'live';
  private readonly _handle: FrameSourceHandle;
  private readonly _device: DeviceDescriptor;
  private readonly _onStop: () => void;

  constructor(handle: FrameSourceHandle, device: DeviceDescriptor, onStop: () => void = () => {}) {
    this._handle = handle;
    this._device = device;
    this._onStop = onStop;
  }

  get readyState(): 'live' | 'ended' {
    return this._readyState;
  }

  get label(): string {
    return this._device.name;
  }

  getSettings(): MediaTrackSettingsLike {
    const { format } = this._handle;
    return {
      width: format.width,
      height: format.height,
      frameRate: format.frameRate,
      aspectRatio: format.height > 0 ? format.width / format.height : undefined,
      deviceId: this._device.deviceId,
      groupId: this._device.groupId,
    };
  }

  /**
   * Close the device once; later calls do nothing
   */
  stop(): void {
    if (this._readyState === 'ended') return;
    this._readyState = 'ended';
    this._onStop();
    this._handle.close();
    logger.debug(`Stopped ${this._device.deviceId}`);
  }
}

export class FrameSourceStream implements MediaStreamLike, FrameProvider {
  private readonly _handle: FrameSourceHandle;
  private readonly _track: FrameSourceTrack;
  private _current: PixelBuffer | null = null;
  private _timer: ReturnType<typeof setTimeout> | null = null;
  private _lastError: unknown = null;

  constructor(handle: FrameSourceHandle, device: DeviceDescriptor) {
    this._handle = handle;
    this._track = new FrameSourceTrack(handle, device, () => this._stopPulling());
  }

  get active(): boolean {
    return this._track.readyState === 'live';
  }

  getTracks(): FrameSourceTrack[] {
    return [this._track];
  }

  getVideoTracks(): FrameSourceTrack[] {
    return [this._track];
  }

  get pulling(): boolean {
    return this._timer !== null;
  }

  /**
   * Error from the most recent background read, cleared by the next good one
   */
  get lastError(): unknown {
    return this._lastError;
  }

  currentFrame(): PixelBuffer | null {
    return this._current;
  }

  /**
   * Keep the current frame fresh until the track stops
   */
  start(): void {
    if (this._timer === null) {
      this._schedule();
    }
  }

  private _schedule(): void {
    if (!this.active) return;
    const rate = this._handle.format.frameRate > 0
      ? this._handle.format.frameRate
      : getCaptureConfig().defaultFrameRate;
    const timer = setTimeout(() => {
      this._timer = null;
      void this._pull();
    }, Math.max(1, Math.round(1000 / rate)));
    // Never holds the process open
    timer.unref();
    this._timer = timer;
  }

  private async _pull(): Promise<void> {
    try {
      await this.refresh();
      this._lastError = null;
    } catch (error) {
      this._lastError = error;
      logger.error('Background frame read failed', error);
    }
    this._schedule();
  }

  private _stopPulling(): void {
    if (this._timer !== null) {
      clearTimeout(this._timer);
      this._timer = null;
    }
  }

  /**
   * Pull and decode the next frame from the device
   */
  async refresh(): Promise<PixelBuffer> {
    if (!this.active) {
      throw new DOMException('Track has ended', 'InvalidStateError');
    }

    const raw = await this._handle.readFrame();
    const rgb = await decodeFrameToRgb888(raw);
    const frame: PixelBuffer = {
      data: rgb888ToRgba8888(rgb.data),
      format: 'RGBA8888',
      width: rgb.width,
      height: rgb.height,
    };
    this._current = frame;
    logger.debug(`Decoded ${raw.format} frame ${rgb.width}x${rgb.height}`);
    return frame;
  }

  controls(): Promise<CameraControl[]> {
    return this._handle.controls();
  }
}
