/**
 * camcap - cross-platform camera capture core
 *
 * A format and control model shared by capture backends, a YUYV/MJPEG pixel
 * codec, and a capture session over a browser-style media stream. In Node,
 * FrameSourceMediaDevices and HeadlessRenderSurface stand in for
 * navigator.mediaDevices and document.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/API/Media_Capture_and_Streams_API
 */

// Types and errors
export type { BufferSource, CameraErrorKind, ResolutionInit } from './types/index.js';
export {
  DOMException,
  CameraError,
  StructureError,
  SetPropertyError,
  ProcessFrameError,
  ReadFrameError,
  NotImplementedError,
  isCameraError,
  describeError,
  Resolution,
  stopTracks,
} from './types/index.js';
export type {
  ConstraintDirective,
  ConstraintPrimitive,
  MediaDeviceInfoLike,
  MediaDeviceKindLike,
  MediaDevicesLike,
  MediaStreamConstraintsRequest,
  MediaStreamLike,
  MediaStreamTrackLike,
  MediaTrackSettingsLike,
  VideoConstraintsRequest,
  DrawingContext2D,
  DrawingSurface,
  ImageDataLike,
  PresentationElement,
  RenderSurface,
  SurfaceElement,
} from './types/index.js';

// Format model and pixel codec
export {
  FRAME_FORMATS,
  NATIVE_CAPTURE_BACKENDS,
  frameFormatToNative,
  nativeToFrameFormat,
  isFrameFormat,
  isNativeCaptureBackend,
  toNativeFormat,
  fromNativeFormat,
  CameraFormat,
  getBytesPerPixel,
  getFrameBufferSize,
  getEncodedFrameSize,
  yuyv444ToRgb888,
  yuyv422ToRgb888,
  rgbaToRgb888,
  rgb888ToRgba8888,
  decodeFrameToRgb888,
  mjpegToRgb888,
} from './formats/index.js';
export type {
  FrameFormat,
  RawFrame,
  CaptureApiBackend,
  NativeCaptureBackend,
  CameraFormatInit,
  PixelLayout,
  PixelBuffer,
  DecodedImage,
} from './formats/index.js';

// Control model
export {
  ALL_KNOWN_CAMERA_CONTROLS,
  compareKnownCameraControls,
  fromCapabilityName,
  isKnownCameraControl,
  toCapabilityName,
  CameraControl,
} from './controls/index.js';
export type { CameraControlFlag, KnownCameraControl, CameraControlInit } from './controls/index.js';

// Capture
export {
  Constraints,
  ConstraintsBuilder,
  SUPPORTED_CONSTRAINTS,
  buildConstraintsRequest,
  parseSupportedConstraint,
  renderConstraintFragments,
  CaptureSession,
} from './capture/index.js';
export type {
  ConstraintDirectives,
  FacingMode,
  ResizeMode,
  SupportedConstraint,
  CaptureContext,
  CaptureSessionState,
} from './capture/index.js';

// Devices
export { CameraInfo, requestPermission, queryCameras, querySupportedConstraints } from './devices/index.js';
export type { CameraInfoInit } from './devices/index.js';

// Backend adapters
export { FrameSourceStream, FrameSourceTrack, FrameSourceMediaDevices } from './sources/index.js';
export type { DeviceDescriptor, FrameSource, FrameSourceHandle } from './sources/index.js';

// Render surfaces
export {
  HeadlessElement,
  HeadlessVideoElement,
  HeadlessCanvas,
  HeadlessCanvasContext2D,
  HeadlessImageData,
  HeadlessRenderSurface,
  DocumentRenderSurface,
} from './surface/index.js';
export type { DocumentLike } from './surface/index.js';

// Configuration
export {
  DEFAULT_CAPTURE_CONFIG,
  getCaptureConfig,
  loadCaptureConfig,
  resetCaptureConfig,
} from './config/index.js';
export type { CaptureConfig, CaptureConfigOverrides, MjpegFailOn } from './config/index.js';

// Utilities
export { Logger, createLogger, setDebugMode, isDebugMode, setLogSink } from './utils/index.js';
export type { LogLevel, LogEntry, LogSink, FrameProvider } from './utils/index.js';
