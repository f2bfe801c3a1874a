/**
 * Capture backend interface
 */

import type { CameraControl } from '../controls/CameraControl.js';
import type { CameraFormat } from '../formats/camera-format.js';
import type { RawFrame } from '../formats/frame-formats.js';

export interface DeviceDescriptor {
  deviceId: string;
  groupId: string;
  /** Position in the backend's own device listing */
  index: number;
  name: string;
  description: string;
}

/**
 * An opened device, delivering encoded frames in its negotiated format
 */
export interface FrameSourceHandle {
  readonly format: CameraFormat;
  readFrame(): Promise<RawFrame>;
  controls(): Promise<CameraControl[]>;
  close(): void;
}

export interface FrameSource {
  enumerate(): Promise<DeviceDescriptor[]>;
  open(device: DeviceDescriptor, format: CameraFormat): Promise<FrameSourceHandle>;
}
