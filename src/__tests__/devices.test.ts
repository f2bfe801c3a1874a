/**
 * Tests for host device queries
 */

import { jest } from '@jest/globals';

import { CameraInfo } from '../devices/CameraInfo.js';
import { queryCameras, querySupportedConstraints, requestPermission } from '../devices/queries.js';
import { DOMException } from '../types/common.js';
import { StructureError } from '../types/errors.js';
import type { MediaDeviceInfoLike, MediaDevicesLike, MediaStreamLike } from '../types/media.js';

const DEVICES: MediaDeviceInfoLike[] = [
  { deviceId: 'mic-a', groupId: 'g1', kind: 'audioinput', label: 'Microphone' },
  { deviceId: 'cam-a', groupId: 'g1', kind: 'videoinput', label: 'Front Camera' },
  { deviceId: 'spk-a', groupId: 'g2', kind: 'audiooutput', label: 'Speakers' },
  { deviceId: 'cam-b', groupId: 'g3', kind: 'videoinput', label: 'Rear Camera' },
];

function mediaDevices(overrides: Partial<MediaDevicesLike> = {}): MediaDevicesLike {
  const stream: MediaStreamLike = { getTracks: () => [], getVideoTracks: () => [] };
  return {
    getUserMedia: async () => stream,
    enumerateDevices: async () => DEVICES,
    ...overrides,
  };
}

describe('CameraInfo', () => {
  it('should format its fields', () => {
    const info = new CameraInfo({ humanName: 'Cam', description: 'videoinput', misc: 'g:d', index: 2 });

    expect(info.toString()).toBe('Name: Cam, Description: videoinput, Extra: g:d, Index: 2');
  });

  it('should sort by index', () => {
    const make = (index: number) => new CameraInfo({ humanName: `c${index}`, description: '', misc: '', index });

    expect([make(3), make(1), make(2)].sort(CameraInfo.compare).map((c) => c.index)).toEqual([1, 2, 3]);
  });
});

describe('queryCameras', () => {
  it('should list video inputs with their position in the full list', async () => {
    const cameras = await queryCameras(mediaDevices());

    expect(cameras.map((camera) => camera.toJSON())).toEqual([
      { humanName: 'Front Camera', description: 'videoinput', misc: 'g1:cam-a', index: 1 },
      { humanName: 'Rear Camera', description: 'videoinput', misc: 'g3:cam-b', index: 3 },
    ]);
  });

  it('should wrap enumeration failures', async () => {
    const failing = mediaDevices({
      enumerateDevices: async () => {
        throw new DOMException('blocked', 'NotAllowedError');
      },
    });

    await expect(queryCameras(failing)).rejects.toThrow('Could not get or cast EnumerateDevices: NotAllowedError: blocked');
  });
});

describe('requestPermission', () => {
  it('should request video only and stop the permission stream', async () => {
    const stop = jest.fn<() => void>();
    const track = { kind: 'video', stop };
    const getUserMedia = jest.fn(async () => ({ getTracks: () => [track], getVideoTracks: () => [track] }));

    await requestPermission(mediaDevices({ getUserMedia }));

    expect(getUserMedia).toHaveBeenCalledWith({ audio: false, video: true });
    expect(stop).toHaveBeenCalledTimes(1);
  });

  it('should wrap a denial', async () => {
    const denied = mediaDevices({
      getUserMedia: async () => {
        throw new DOMException('denied', 'NotAllowedError');
      },
    });

    await expect(requestPermission(denied)).rejects.toBeInstanceOf(StructureError);
  });
});

describe('querySupportedConstraints', () => {
  it('should keep enabled names the builder knows', () => {
    const supported = querySupportedConstraints(mediaDevices({
      getSupportedConstraints: () => ({
        width: true,
        height: true,
        frameRate: false,
        torch: true,
        deviceId: true,
        echoCancellation: true,
      }),
    }));

    expect(supported).toEqual(['width', 'height', 'deviceId']);
  });

  it('should fail when the host cannot answer', () => {
    expect(() => querySupportedConstraints(mediaDevices())).toThrow(StructureError);
  });
});
