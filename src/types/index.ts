/**
 * Type exports
 */

export { DOMException, type BufferSource } from './common.js';

export {
  CameraError,
  StructureError,
  SetPropertyError,
  ProcessFrameError,
  ReadFrameError,
  NotImplementedError,
  isCameraError,
  describeError,
  type CameraErrorKind,
} from './errors.js';

export { Resolution, type ResolutionInit } from './geometry.js';

export {
  directiveValue,
  isExactDirective,
  stopTracks,
  type ConstraintDirective,
  type ConstraintPrimitive,
  type MediaDeviceInfoLike,
  type MediaDeviceKindLike,
  type MediaDevicesLike,
  type MediaStreamConstraintsRequest,
  type MediaStreamLike,
  type MediaStreamTrackLike,
  type MediaTrackSettingsLike,
  type VideoConstraintsRequest,
} from './media.js';

export type {
  DrawingContext2D,
  DrawingSurface,
  ImageDataLike,
  PresentationElement,
  RenderSurface,
  SurfaceElement,
} from './surface.js';
