export {
  DEFAULT_CAPTURE_CONFIG,
  getCaptureConfig,
  loadCaptureConfig,
  resetCaptureConfig,
  sanitizeOverrides,
  type CaptureConfig,
  type CaptureConfigOverrides,
  type MjpegFailOn,
} from './capture-config.js';
