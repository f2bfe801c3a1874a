/**
 * MediaDevices over a FrameSource backend
 *
 * Lets a CaptureSession run in Node against a native camera backend the same
 * way it runs in a browser against navigator.mediaDevices.
 */

import { getCaptureConfig } from '../config/capture-config.js';
import { CameraFormat } from '../formats/camera-format.js';
import { DOMException } from '../types/common.js';
import { Resolution } from '../types/geometry.js';
import {
  directiveValue,
  isExactDirective,
  type ConstraintDirective,
  type MediaDeviceInfoLike,
  type MediaDevicesLike,
  type MediaStreamConstraintsRequest,
  type VideoConstraintsRequest,
} from '../types/media.js';
import { createLogger } from '../utils/logger.js';
import { FrameSourceStream } from './FrameSourceStream.js';
import type { DeviceDescriptor, FrameSource, FrameSourceHandle } from './types.js';

const logger = createLogger('FrameSourceMediaDevices');

function numericDirective(directive: ConstraintDirective | undefined): number | undefined {
  const value = directiveValue(directive);
  return typeof value === 'number' && value > 0 ? value : undefined;
}

export class FrameSourceMediaDevices implements MediaDevicesLike {
  private readonly _source: FrameSource;

  constructor(source: FrameSource) {
    this._source = source;
  }

  async enumerateDevices(): Promise<MediaDeviceInfoLike[]> {
    const devices = await this._source.enumerate();
    return devices.map((device): MediaDeviceInfoLike => ({
      deviceId: device.deviceId,
      groupId: device.groupId,
      kind: 'videoinput',
      label: device.name,
    }));
  }

  getSupportedConstraints(): Record<string, boolean> {
    return {
      deviceId: true,
      groupId: true,
      width: true,
      height: true,
      frameRate: true,
      aspectRatio: false,
      facingMode: false,
      resizeMode: false,
    };
  }

  async getUserMedia(constraints: MediaStreamConstraintsRequest): Promise<FrameSourceStream> {
    const video: VideoConstraintsRequest = constraints.video === true ? {} : constraints.video;
    const device = this._selectDevice(await this._source.enumerate(), video);
    const format = this._requestedFormat(video);

    logger.debug(`Opening ${device.deviceId} as ${format.toString()}`);
    const handle = await this._source.open(device, format);

    try {
      this._checkExact(video, handle);
      const stream = new FrameSourceStream(handle, device);
      await stream.refresh();
      stream.start();
      return stream;
    } catch (error) {
      handle.close();
      throw error;
    }
  }

  private _selectDevice(devices: DeviceDescriptor[], video: VideoConstraintsRequest): DeviceDescriptor {
    if (devices.length === 0) {
      throw new DOMException('No video input devices', 'NotFoundError');
    }

    for (const field of ['deviceId', 'groupId'] as const) {
      const wanted = directiveValue(video[field]);
      if (wanted === undefined) continue;

      const match = devices.find((device) => device[field] === wanted);
      if (match) return match;
      if (isExactDirective(video[field])) {
        throw new DOMException(`No device with ${field} '${wanted}'`, 'NotFoundError');
      }
    }
    return devices[0];
  }

  private _requestedFormat(video: VideoConstraintsRequest): CameraFormat {
    const config = getCaptureConfig();
    const width = numericDirective(video.width) ?? config.fallbackResolution.width;
    const height = numericDirective(video.height) ?? config.fallbackResolution.height;
    const frameRate = numericDirective(video.frameRate) ?? config.defaultFrameRate;
    return new CameraFormat({
      resolution: new Resolution(Math.round(width), Math.round(height)),
      format: config.defaultFrameFormat,
      frameRate: Math.round(frameRate),
    });
  }

  private _checkExact(video: VideoConstraintsRequest, handle: FrameSourceHandle): void {
    const opened: Record<'width' | 'height' | 'frameRate', number> = {
      width: handle.format.width,
      height: handle.format.height,
      frameRate: handle.format.frameRate,
    };

    for (const field of ['width', 'height', 'frameRate'] as const) {
      const directive = video[field];
      if (!isExactDirective(directive)) continue;
      const wanted = directiveValue(directive);
      if (wanted !== opened[field]) {
        throw new DOMException(
          `Device opened with ${field} ${opened[field]}, ${String(wanted)} required`,
          'OverconstrainedError'
        );
      }
    }
  }
}
