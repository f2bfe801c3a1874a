/**
 * Media capture types
 *
 * Structural subsets of the browser Media Capture API. A browser's
 * navigator.mediaDevices satisfies MediaDevicesLike as-is; Node hosts use
 * the FrameSource adapters.
 */

export type ConstraintPrimitive = string | number;

/**
 * One rendered directive: either a hard requirement or a preference
 */
export type ConstraintDirective = { exact: ConstraintPrimitive } | { ideal: ConstraintPrimitive };

export type VideoConstraintsRequest = Record<string, ConstraintDirective>;

export interface MediaStreamConstraintsRequest {
  audio: false;
  /** `true` when no video directive was set */
  video: true | VideoConstraintsRequest;
}

export interface MediaTrackSettingsLike {
  width?: number;
  height?: number;
  frameRate?: number;
  aspectRatio?: number;
  deviceId?: string;
  groupId?: string;
}

export interface MediaStreamTrackLike {
  readonly kind: string;
  readonly readyState?: 'live' | 'ended';
  stop(): void;
  getSettings?(): MediaTrackSettingsLike;
}

export interface MediaStreamLike {
  getTracks(): MediaStreamTrackLike[];
  getVideoTracks(): MediaStreamTrackLike[];
}

export type MediaDeviceKindLike = 'videoinput' | 'audioinput' | 'audiooutput';

export interface MediaDeviceInfoLike {
  readonly deviceId: string;
  readonly groupId: string;
  readonly kind: MediaDeviceKindLike;
  readonly label: string;
}

export interface MediaDevicesLike {
  getUserMedia(constraints: MediaStreamConstraintsRequest): Promise<MediaStreamLike>;
  enumerateDevices(): Promise<MediaDeviceInfoLike[]>;
  getSupportedConstraints?(): Record<string, boolean | undefined>;
}

/**
 * Read the value of a directive regardless of exact/ideal
 */
export function directiveValue(directive: ConstraintDirective | undefined): ConstraintPrimitive | undefined {
  if (!directive) return undefined;
  return 'exact' in directive ? directive.exact : directive.ideal;
}

export function isExactDirective(directive: ConstraintDirective | undefined): boolean {
  return directive !== undefined && 'exact' in directive;
}

/**
 * Stop every track of a stream
 */
export function stopTracks(stream: MediaStreamLike): void {
  for (const track of stream.getTracks()) {
    track.stop();
  }
}
