/**
 * Tests for CaptureSession
 */

import { jest } from '@jest/globals';

import { CaptureSession, releaseAbandonedStream } from '../capture/CaptureSession.js';
import { Constraints, ConstraintsBuilder } from '../capture/constraints.js';
import { FrameSourceMediaDevices } from '../sources/FrameSourceMediaDevices.js';
import { HeadlessElement, HeadlessVideoElement } from '../surface/HeadlessElement.js';
import { HeadlessImageData } from '../surface/HeadlessImageData.js';
import { HeadlessRenderSurface } from '../surface/HeadlessRenderSurface.js';
import {
  ReadFrameError,
  SetPropertyError,
  StructureError,
} from '../types/errors.js';
import { Resolution } from '../types/geometry.js';
import type { MediaDevicesLike, MediaStreamLike, MediaStreamTrackLike } from '../types/media.js';
import type { RenderSurface } from '../types/surface.js';
import { CameraFormat } from '../formats/camera-format.js';
import { BLACK, RED, SyntheticFrameSource, WHITE, makeDevice } from './helpers/synthetic-source.js';

// Each row is two red pixels then two white ones
const RED_WHITE_ROW = [255, 0, 0, 255, 0, 0, 255, 255, 255, 255, 255, 255];

function fourByTwo(): Constraints {
  return new ConstraintsBuilder().resolution(new Resolution(4, 2)).build();
}

async function openSession(constraints: Constraints = fourByTwo(), source = new SyntheticFrameSource(
  [makeDevice(0)],
  { pattern: (pairX) => (pairX === 0 ? RED : WHITE) }
)) {
  const surface = new HeadlessRenderSurface();
  const container = surface.addContainer('preview');
  const session = await CaptureSession.open(constraints, {
    mediaDevices: new FrameSourceMediaDevices(source),
    surface,
  });
  return { session, surface, container, source };
}

function fakeTrack(): MediaStreamTrackLike {
  return { kind: 'video', stop: jest.fn<() => void>() };
}

function fakeMediaDevices(stream: MediaStreamLike): MediaDevicesLike {
  return {
    getUserMedia: async () => stream,
    enumerateDevices: async () => [],
  };
}

describe('CaptureSession', () => {
  // Opened streams pull frames on a timer
  beforeEach(() => {
    jest.useFakeTimers({ doNotFake: ['nextTick', 'queueMicrotask', 'setImmediate'] });
  });

  afterEach(() => {
    jest.clearAllTimers();
    jest.useRealTimers();
    jest.restoreAllMocks();
  });

  describe('open', () => {
    it('should pass the constraints request to getUserMedia', async () => {
      const track = fakeTrack();
      const stream = { getTracks: () => [track], getVideoTracks: () => [track] };
      const getUserMedia = jest.fn(async () => stream);

      const session = await CaptureSession.open(fourByTwo(), {
        mediaDevices: { getUserMedia, enumerateDevices: async () => [] },
        surface: new HeadlessRenderSurface(),
      });

      expect(getUserMedia).toHaveBeenCalledTimes(1);
      expect(getUserMedia).toHaveBeenCalledWith({
        audio: false,
        video: { height: { ideal: 2 }, width: { ideal: 4 } },
      });
      expect(session.state).toBe('open');
      expect(session.attached).toBe(false);
    });

    it('should wrap a rejected request in a StructureError', async () => {
      const promise = openSession(fourByTwo(), new SyntheticFrameSource([]));

      await expect(promise).rejects.toBeInstanceOf(StructureError);
      await expect(promise).rejects.toThrow(
        'Could not get or cast MediaDevicesGetUserMedia: NotFoundError: No video input devices'
      );
    });
  });

  describe('preferredResolution', () => {
    it('should use the requested resolution', async () => {
      const { session } = await openSession();
      expect(session.preferredResolution.toString()).toBe('4x2');
    });

    it('should fall back to the track settings', async () => {
      const source = new SyntheticFrameSource([makeDevice(0)], {
        forcedFormat: CameraFormat.fromSize(8, 4, 'YUYV', 30),
      });
      const { session } = await openSession(Constraints.unconstrained(), source);

      expect(session.preferredResolution.toString()).toBe('8x4');
    });

    it('should fall back to 640x480 when the track reports nothing', async () => {
      const track = fakeTrack();
      const stream = { getTracks: () => [track], getVideoTracks: () => [track] };
      const session = await CaptureSession.open(Constraints.unconstrained(), {
        mediaDevices: fakeMediaDevices(stream),
        surface: new HeadlessRenderSurface(),
      });

      expect(session.preferredResolution.toString()).toBe('640x480');
      expect(session.minBufferSize(true)).toBe(1228800);
      expect(session.minBufferSize(false)).toBe(921600);
    });
  });

  describe('attach', () => {
    it('should append a new video element sized to the preferred resolution', async () => {
      const { session, container } = await openSession();

      session.attach('preview', true);

      expect(container.children).toHaveLength(1);
      const video = container.children[0];
      expect(video).toBeInstanceOf(HeadlessVideoElement);
      expect(session.attachedNode).toBe(video);
      expect(session.attached).toBe(true);
      if (!(video instanceof HeadlessVideoElement)) return;
      expect(video.width).toBe(4);
      expect(video.height).toBe(2);
      expect(video.srcObject).toBe(session.stream);
      expect(video.autoplay).toBe(true);
      expect(video.playsInline).toBe(true);
    });

    it('should bind an existing video element in place', async () => {
      const { session, surface } = await openSession();
      const video = new HeadlessVideoElement();
      video.id = 'camera';
      surface.body.appendChild(video);

      session.attach('camera', false);

      expect(session.attachedNode).toBe(video);
      expect(video.srcObject).toBe(session.stream);
      expect(video.width).toBe(4);
      expect(video.height).toBe(2);
    });

    it('should fail for a missing target', async () => {
      const { session } = await openSession();

      expect(() => session.attach('missing', true)).toThrow('Could not get or cast Document missing: None');
      expect(session.attached).toBe(false);
    });

    it('should fail when the target is not a video element', async () => {
      const { session } = await openSession();

      expect(() => session.attach('preview', false)).toThrow(StructureError);
      expect(session.attached).toBe(false);
    });

    it('should report attributes that cannot be set', async () => {
      const { session, surface } = await openSession();
      class LockedVideo extends HeadlessVideoElement {
        setAttribute(): void {
          throw new Error('read-only');
        }
      }
      const locked = new LockedVideo();
      surface.body.appendChild(locked);
      locked.id = 'locked';

      expect(() => session.attach('locked', false)).toThrow(SetPropertyError);
    });

    it('should leave an earlier element bound when attaching again', async () => {
      const { session, container } = await openSession();

      session.attach('preview', true);
      session.attach('preview', true);
      const [first, second] = container.children;
      session.deAttach();

      expect(first).toBeInstanceOf(HeadlessVideoElement);
      expect(second).toBeInstanceOf(HeadlessVideoElement);
      if (!(first instanceof HeadlessVideoElement) || !(second instanceof HeadlessVideoElement)) return;
      expect(first.srcObject).toBe(session.stream);
      expect(second.srcObject).toBeNull();
    });
  });

  describe('deAttach', () => {
    it('should do nothing when not attached', async () => {
      const { session } = await openSession();

      expect(() => session.deAttach()).not.toThrow();
      expect(session.attached).toBe(false);
    });

    it('should unbind the stream and forget the node', async () => {
      const { session, container } = await openSession();
      session.attach('preview', true);
      const video = container.children[0];

      session.deAttach();

      expect(session.attached).toBe(false);
      expect(session.attachedNode).toBeNull();
      expect(video instanceof HeadlessVideoElement && video.srcObject).toBeNull();
      expect(container.children).toHaveLength(1);
    });
  });

  describe('frames', () => {
    it('should read RGB888 through a temporary element', async () => {
      const { session, container } = await openSession();

      const frame = session.frame();

      expect(frame.format).toBe('RGB888');
      expect(frame.width).toBe(4);
      expect(frame.height).toBe(2);
      expect(Array.from(frame.data)).toEqual([...RED_WHITE_ROW, ...RED_WHITE_ROW]);
      expect(container.children).toHaveLength(0);
    });

    it('should read through the attached element', async () => {
      const { session } = await openSession();
      session.attach('preview', true);

      expect(Array.from(session.frame().data)).toEqual([...RED_WHITE_ROW, ...RED_WHITE_ROW]);
    });

    it('should read RGBA with opaque alpha', async () => {
      const { session } = await openSession();

      const frame = session.rgbaFrame();

      expect(frame.format).toBe('RGBA8888');
      expect(frame.data.length).toBe(32);
      expect(Array.from(frame.data.subarray(0, 8))).toEqual([255, 0, 0, 255, 255, 0, 0, 255]);
      expect(Array.from(session.frameRaw())).toEqual(Array.from(frame.data));
    });

    it('should scale to a new resolution after setConstraints', async () => {
      const { session } = await openSession();

      session.setConstraints(new ConstraintsBuilder().resolution(new Resolution(2, 1)).build());

      expect(Array.from(session.frame().data)).toEqual([255, 0, 0, 255, 255, 255]);
    });

    it('should read blank pixels when the stream has no picture', async () => {
      const track = fakeTrack();
      const stream = { getTracks: () => [track], getVideoTracks: () => [track] };
      const session = await CaptureSession.open(new ConstraintsBuilder().resolution(new Resolution(2, 2)).build(), {
        mediaDevices: fakeMediaDevices(stream),
        surface: new HeadlessRenderSurface(),
      });

      expect(Array.from(session.frame().data)).toEqual(new Array(12).fill(0));
    });
  });

  describe('live frames', () => {
    it('should see each new camera frame on successive reads', async () => {
      let color = RED;
      const source = new SyntheticFrameSource([makeDevice(0)], { pattern: () => color });
      const { session } = await openSession(
        new ConstraintsBuilder().resolution(new Resolution(2, 1)).build(),
        source
      );

      expect(Array.from(session.frame().data)).toEqual([255, 0, 0, 255, 0, 0]);

      color = WHITE;
      await jest.advanceTimersByTimeAsync(100);
      expect(Array.from(session.rgbaFrame().data)).toEqual([255, 255, 255, 255, 255, 255, 255, 255]);

      color = BLACK;
      await jest.advanceTimersByTimeAsync(50);
      const buffer = new Uint8Array(6).fill(7);
      expect(session.writeFrameToBuffer(buffer, false)).toBe(6);
      expect(Array.from(buffer)).toEqual([0, 0, 0, 0, 0, 0]);
      expect(source.handles[0].framesRead).toBe(3);
    });

    it('should stop reading the camera once closed', async () => {
      const { session, source } = await openSession();

      session.close();
      await jest.advanceTimersByTimeAsync(1000);

      expect(source.handles[0].framesRead).toBe(1);
      expect(jest.getTimerCount()).toBe(0);
    });
  });

  describe('frame failures', () => {
    function surfaceWith(getContext: () => unknown): RenderSurface {
      const headless = new HeadlessRenderSurface();
      return {
        getElementById: (id) => headless.getElementById(id),
        createElement: (tagName) => headless.createElement(tagName),
        createCanvas: (width, height) => ({ width, height, getContext }),
      };
    }

    async function openWith(surface: RenderSurface): Promise<CaptureSession> {
      return CaptureSession.open(fourByTwo(), {
        mediaDevices: new FrameSourceMediaDevices(new SyntheticFrameSource()),
        surface,
      });
    }

    it('should fail without a 2D context', async () => {
      const session = await openWith(surfaceWith(() => null));

      expect(() => session.frameRaw()).toThrow('Could not get or cast HtmlCanvasElement Context 2D: None');
    });

    it('should report a failed readback', async () => {
      const session = await openWith(surfaceWith(() => ({
        drawImage: () => undefined,
        getImageData: () => {
          throw new Error('tainted');
        },
      })));

      expect(() => session.frameRaw()).toThrow(ReadFrameError);
      expect(() => session.frameRaw()).toThrow('Could not read frame: Failed to get image data: tainted');
    });

    it('should report a failed draw', async () => {
      const session = await openWith(surfaceWith(() => ({
        drawImage: () => {
          throw new Error('not ready');
        },
        getImageData: () => new HeadlessImageData(4, 2),
      })));

      expect(() => session.frame()).toThrow('Could not read frame: Failed to draw: not ready');
    });

    it('should reject a readback of the wrong size', async () => {
      const session = await openWith(surfaceWith(() => ({
        drawImage: () => undefined,
        getImageData: () => new HeadlessImageData(2, 2),
      })));

      expect(() => session.frame()).toThrow('Could not read frame: Read 16 bytes, expected 32 for 4x2');
    });
  });

  describe('writeFrameToBuffer', () => {
    it('should write RGB and return the byte count', async () => {
      const { session } = await openSession();
      const buffer = new Uint8Array(30);

      expect(session.writeFrameToBuffer(buffer, false)).toBe(24);
      expect(Array.from(buffer.subarray(0, 12))).toEqual(RED_WHITE_ROW);
      expect(Array.from(buffer.subarray(24))).toEqual([0, 0, 0, 0, 0, 0]);
    });

    it('should write RGBA when asked', async () => {
      const { session } = await openSession();
      const buffer = new Uint8Array(session.minBufferSize(true));

      expect(session.writeFrameToBuffer(buffer, true)).toBe(32);
      expect(buffer[3]).toBe(255);
    });

    it('should write nothing into a short buffer', async () => {
      const { session } = await openSession();
      const buffer = new Uint8Array(23).fill(7);

      expect(() => session.writeFrameToBuffer(buffer, false)).toThrow(ReadFrameError);
      expect(buffer.every((value) => value === 7)).toBe(true);
    });
  });

  describe('close', () => {
    it('should stop the tracks and detach once', async () => {
      const { session, source, container } = await openSession();
      session.attach('preview', true);
      const video = container.children[0];

      session.close();
      session.close();

      expect(session.state).toBe('closed');
      expect(session.attached).toBe(false);
      expect(source.handles[0].closeCount).toBe(1);
      expect(session.stream.getTracks()[0].readyState).toBe('ended');
      expect(video instanceof HeadlessVideoElement && video.srcObject).toBeNull();
    });

    it('should drop its collection backstop on close', async () => {
      const register = jest.spyOn(FinalizationRegistry.prototype, 'register');
      const unregister = jest.spyOn(FinalizationRegistry.prototype, 'unregister');
      const { session } = await openSession();

      expect(register).toHaveBeenCalledWith(session, session.stream, session);

      session.close();
      session.close();

      expect(unregister).toHaveBeenCalledTimes(1);
      expect(unregister).toHaveBeenCalledWith(session);
    });

    it('should stop the tracks of a collected session', () => {
      const track = fakeTrack();

      releaseAbandonedStream({ getTracks: () => [track], getVideoTracks: () => [track] });

      expect(track.stop).toHaveBeenCalledTimes(1);
    });

    it('should reject use after close', async () => {
      const { session } = await openSession();
      session.close();

      expect(() => session.frame()).toThrow('Could not get or cast CaptureSession: CaptureSession is closed');
      expect(() => session.attach('preview', true)).toThrow(StructureError);
      expect(() => session.setConstraints(Constraints.unconstrained())).toThrow(StructureError);
    });
  });

  it('should expose containers as plain elements', async () => {
    const { container } = await openSession();
    expect(container).toBeInstanceOf(HeadlessElement);
  });
});
