/**
 * Control model
 */

export {
  ALL_KNOWN_CAMERA_CONTROLS,
  compareKnownCameraControls,
  fromCapabilityName,
  isKnownCameraControl,
  toCapabilityName,
  type CameraControlFlag,
  type KnownCameraControl,
} from './known-controls.js';

export { CameraControl, type CameraControlInit } from './CameraControl.js';
