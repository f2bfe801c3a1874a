/**
 * Encoded frame formats and their native tags per capture backend
 */

import { NotImplementedError } from '../types/errors.js';
import type { Resolution } from '../types/geometry.js';

export type FrameFormat = 'MJPEG' | 'YUYV';

export const FRAME_FORMATS: readonly FrameFormat[] = ['MJPEG', 'YUYV'];

/**
 * An encoded frame as delivered by a capture backend
 */
export interface RawFrame {
  format: FrameFormat;
  resolution: Resolution;
  data: Uint8Array;
}

export type CaptureApiBackend =
  | 'Auto'
  | 'AVFoundation'
  | 'Video4Linux'
  | 'UniversalVideoClass'
  | 'MediaFoundation'
  | 'OpenCv'
  | 'GStreamer'
  | 'Browser';

/**
 * Backends that describe frames with a native format tag
 */
export type NativeCaptureBackend = Exclude<CaptureApiBackend, 'Auto' | 'Browser'>;

export const NATIVE_CAPTURE_BACKENDS: readonly NativeCaptureBackend[] = [
  'AVFoundation',
  'Video4Linux',
  'UniversalVideoClass',
  'MediaFoundation',
  'OpenCv',
  'GStreamer',
];

/**
 * FrameFormat to native tag, per backend.
 * The record types keep every table total over FrameFormat.
 */
export const frameFormatToNative: Record<NativeCaptureBackend, Record<FrameFormat, string>> = {
  AVFoundation: {
    MJPEG: 'jpeg',
    YUYV: 'yuvs',
  },
  Video4Linux: {
    MJPEG: 'MJPG',
    YUYV: 'YUYV',
  },
  UniversalVideoClass: {
    MJPEG: 'MJPEG',
    YUYV: 'YUYV',
  },
  MediaFoundation: {
    MJPEG: 'MFVideoFormat_MJPG',
    YUYV: 'MFVideoFormat_YUY2',
  },
  OpenCv: {
    MJPEG: 'MJPG',
    YUYV: 'YUYV',
  },
  GStreamer: {
    MJPEG: 'image/jpeg',
    YUYV: 'video/x-raw,format=YUY2',
  },
};

/**
 * Native tag to FrameFormat, per backend (derived from the forward tables)
 */
export const nativeToFrameFormat: Record<NativeCaptureBackend, ReadonlyMap<string, FrameFormat>> = {
  AVFoundation: invert(frameFormatToNative.AVFoundation),
  Video4Linux: invert(frameFormatToNative.Video4Linux),
  UniversalVideoClass: invert(frameFormatToNative.UniversalVideoClass),
  MediaFoundation: invert(frameFormatToNative.MediaFoundation),
  OpenCv: invert(frameFormatToNative.OpenCv),
  GStreamer: invert(frameFormatToNative.GStreamer),
};

function invert(table: Record<FrameFormat, string>): ReadonlyMap<string, FrameFormat> {
  const map = new Map<string, FrameFormat>();
  for (const format of FRAME_FORMATS) {
    map.set(table[format], format);
  }
  return map;
}

export function isFrameFormat(value: unknown): value is FrameFormat {
  return value === 'MJPEG' || value === 'YUYV';
}

export function isNativeCaptureBackend(value: unknown): value is NativeCaptureBackend {
  return NATIVE_CAPTURE_BACKENDS.some((backend) => backend === value);
}

/**
 * Get the native tag a backend uses for a frame format
 */
export function toNativeFormat(backend: NativeCaptureBackend, format: FrameFormat): string {
  return frameFormatToNative[backend][format];
}

/**
 * Resolve a backend's native tag to a frame format
 */
export function fromNativeFormat(backend: NativeCaptureBackend, tag: string): FrameFormat {
  const format = nativeToFrameFormat[backend].get(tag);
  if (!format) {
    throw new NotImplementedError(`${backend} frame format '${tag}'`);
  }
  return format;
}
