/**
 * Host media-device queries
 */

import {
  parseSupportedConstraint,
  type SupportedConstraint,
} from '../capture/constraints.js';
import { StructureError, describeError } from '../types/errors.js';
import { stopTracks, type MediaDeviceInfoLike, type MediaDevicesLike } from '../types/media.js';
import { createLogger } from '../utils/logger.js';
import { CameraInfo } from './CameraInfo.js';

const logger = createLogger('devices');

/**
 * Ask the host for camera access, releasing the permission stream right away
 */
export async function requestPermission(mediaDevices: MediaDevicesLike): Promise<void> {
  try {
    const stream = await mediaDevices.getUserMedia({ audio: false, video: true });
    stopTracks(stream);
  } catch (error) {
    throw new StructureError('UserMediaPermission', describeError(error));
  }
}

/**
 * List video inputs. `index` is the device's position in the host's full list.
 */
export async function queryCameras(mediaDevices: MediaDevicesLike): Promise<CameraInfo[]> {
  let devices: MediaDeviceInfoLike[];
  try {
    devices = await mediaDevices.enumerateDevices();
  } catch (error) {
    throw new StructureError('EnumerateDevices', describeError(error));
  }

  const cameras: CameraInfo[] = [];
  devices.forEach((device, index) => {
    if (device.kind !== 'videoinput') return;
    cameras.push(new CameraInfo({
      humanName: device.label,
      description: device.kind,
      misc: `${device.groupId}:${device.deviceId}`,
      index,
    }));
  });

  logger.debug(`Found ${cameras.length} of ${devices.length} devices`);
  return cameras;
}

/**
 * Constraint names the host honours, limited to the ones the builder emits
 */
export function querySupportedConstraints(mediaDevices: MediaDevicesLike): SupportedConstraint[] {
  if (!mediaDevices.getSupportedConstraints) {
    throw new StructureError('MediaDevicesGetSupportedConstraints', 'None');
  }

  const supported: SupportedConstraint[] = [];
  for (const [name, enabled] of Object.entries(mediaDevices.getSupportedConstraints())) {
    if (!enabled) continue;
    const constraint = parseSupportedConstraint(name);
    if (constraint) {
      supported.push(constraint);
    }
  }
  return supported;
}
