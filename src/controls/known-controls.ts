/**
 * Camera controls known across backends
 */

import { NotImplementedError } from '../types/errors.js';

export type KnownCameraControl =
  | 'Brightness'
  | 'Contrast'
  | 'Hue'
  | 'Saturation'
  | 'Sharpness'
  | 'Gamma'
  | 'ColorEnable'
  | 'WhiteBalance'
  | 'BacklightComp'
  | 'Gain'
  | 'Pan'
  | 'Tilt'
  | 'Roll'
  | 'Zoom'
  | 'Exposure'
  | 'Iris'
  | 'Focus';

/**
 * All known controls, in sort order
 */
export const ALL_KNOWN_CAMERA_CONTROLS: readonly KnownCameraControl[] = [
  'Brightness',
  'Contrast',
  'Hue',
  'Saturation',
  'Sharpness',
  'Gamma',
  'ColorEnable',
  'WhiteBalance',
  'BacklightComp',
  'Gain',
  'Pan',
  'Tilt',
  'Roll',
  'Zoom',
  'Exposure',
  'Iris',
  'Focus',
];

export type CameraControlFlag = 'Automatic' | 'Manual';

export function isKnownCameraControl(value: unknown): value is KnownCameraControl {
  return ALL_KNOWN_CAMERA_CONTROLS.some((control) => control === value);
}

export function compareKnownCameraControls(a: KnownCameraControl, b: KnownCameraControl): number {
  return ALL_KNOWN_CAMERA_CONTROLS.indexOf(a) - ALL_KNOWN_CAMERA_CONTROLS.indexOf(b);
}

/**
 * Media track capability name for each control a browser exposes
 */
const controlToCapability: Partial<Record<KnownCameraControl, string>> = {
  Brightness: 'brightness',
  Contrast: 'contrast',
  Saturation: 'saturation',
  Sharpness: 'sharpness',
  WhiteBalance: 'colorTemperature',
  Pan: 'pan',
  Tilt: 'tilt',
  Zoom: 'zoom',
  Exposure: 'exposureTime',
  Focus: 'focusDistance',
};

const capabilityToControl: ReadonlyMap<string, KnownCameraControl> = new Map(
  ALL_KNOWN_CAMERA_CONTROLS.flatMap((control): [string, KnownCameraControl][] => {
    const name = controlToCapability[control];
    return name ? [[name, control]] : [];
  })
);

/**
 * Get the media track capability name of a control
 */
export function toCapabilityName(control: KnownCameraControl): string {
  const name = controlToCapability[control];
  if (!name) {
    throw new NotImplementedError(`Browser capability for ${control}`);
  }
  return name;
}

/**
 * Resolve a media track capability name to a control
 */
export function fromCapabilityName(name: string): KnownCameraControl {
  const control = capabilityToControl.get(name);
  if (!control) {
    throw new NotImplementedError(`Camera control for capability '${name}'`);
  }
  return control;
}
