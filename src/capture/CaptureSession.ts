/**
 * CaptureSession - a media stream bound to a render surface
 *
 * State machine:
 *   open (detached) <-> open (attached) -> closed
 *
 * Only open() suspends; every other operation runs to completion
 * synchronously. A session is not safe for concurrent use.
 */

import { getCaptureConfig } from '../config/capture-config.js';
import { rgbaToRgb888 } from '../formats/conversions/frame-converter.js';
import { getFrameBufferSize, type PixelBuffer, type PixelLayout } from '../formats/pixel-formats.js';
import {
  ReadFrameError,
  SetPropertyError,
  StructureError,
  describeError,
} from '../types/errors.js';
import { Resolution } from '../types/geometry.js';
import { stopTracks, type MediaDevicesLike, type MediaStreamLike } from '../types/media.js';
import type {
  DrawingContext2D,
  PresentationElement,
  RenderSurface,
  SurfaceElement,
} from '../types/surface.js';
import { toUint8Array } from '../utils/buffer.js';
import { createLogger } from '../utils/logger.js';
import {
  isDrawingContext2D,
  isImageDataLike,
  isPresentationElement,
} from '../utils/type-guards.js';
import { validateNotClosed } from '../utils/validation.js';
import type { Constraints } from './constraints.js';

const logger = createLogger('CaptureSession');

export type CaptureSessionState = 'open' | 'closed';

/**
 * Host capabilities a session runs against
 */
export interface CaptureContext {
  mediaDevices: MediaDevicesLike;
  surface: RenderSurface;
}

/**
 * Cleanup for sessions that are collected without close()
 */
export function releaseAbandonedStream(stream: MediaStreamLike): void {
  logger.warn('CaptureSession was garbage collected without close(); stopping its tracks');
  stopTracks(stream);
}

const abandonedStreams = new FinalizationRegistry<MediaStreamLike>(releaseAbandonedStream);

function setAutoplayInline(element: SurfaceElement): void {
  for (const attribute of ['autoplay', 'playsinline']) {
    try {
      element.setAttribute(attribute, 'true');
    } catch (error) {
      throw new SetPropertyError(`HtmlVideoElement ${attribute}`, 'true', describeError(error));
    }
  }
}

function castPresentation(element: SurfaceElement, structure: string): PresentationElement {
  if (!isPresentationElement(element)) {
    throw new StructureError(structure, 'Cannot Cast');
  }
  return element;
}

export class CaptureSession {
  private _state: CaptureSessionState = 'open';
  private _constraints: Constraints;
  private readonly _stream: MediaStreamLike;
  private readonly _surface: RenderSurface;
  private _attached = false;
  private _attachedNode: PresentationElement | null = null;

  private constructor(constraints: Constraints, stream: MediaStreamLike, surface: RenderSurface) {
    this._constraints = constraints;
    this._stream = stream;
    this._surface = surface;
    abandonedStreams.register(this, stream, this);
  }

  /**
   * Request a stream for the constraints. One request, no retry.
   */
  static async open(constraints: Constraints, context: CaptureContext): Promise<CaptureSession> {
    let stream: MediaStreamLike;
    try {
      stream = await context.mediaDevices.getUserMedia(constraints.request);
    } catch (error) {
      logger.debug('getUserMedia rejected', error);
      throw new StructureError('MediaDevicesGetUserMedia', describeError(error));
    }
    logger.debug('Opened stream', constraints.request);
    return new CaptureSession(constraints, stream, context.surface);
  }

  get state(): CaptureSessionState {
    return this._state;
  }

  get attached(): boolean {
    return this._attached;
  }

  get attachedNode(): PresentationElement | null {
    return this._attachedNode;
  }

  get stream(): MediaStreamLike {
    return this._stream;
  }

  get constraints(): Constraints {
    return this._constraints;
  }

  /**
   * Resolution frames are drawn at: the requested one, else what the
   * track reports, else the configured fallback.
   */
  get preferredResolution(): Resolution {
    if (!this._constraints.resolution.isNull()) {
      return this._constraints.resolution;
    }

    const settings = this._stream.getVideoTracks()[0]?.getSettings?.();
    if (settings && typeof settings.width === 'number' && typeof settings.height === 'number' &&
        settings.width > 0 && settings.height > 0) {
      return new Resolution(settings.width, settings.height);
    }

    return getCaptureConfig().fallbackResolution;
  }

  /**
   * Swap in a new constraints snapshot. The live stream is not renegotiated;
   * the new resolution applies to the next attach or frame.
   */
  setConstraints(constraints: Constraints): void {
    validateNotClosed(this._state, 'CaptureSession');
    this._constraints = constraints;
  }

  /**
   * Bind the stream to a presentation element under `targetId`.
   *
   * With createNew a fresh video element is appended to the target,
   * otherwise the target itself must be a video element.
   */
  attach(targetId: string, createNew: boolean): void {
    validateNotClosed(this._state, 'CaptureSession');

    const target = this._surface.getElementById(targetId);
    if (!target) {
      throw new StructureError(`Document ${targetId}`, 'None');
    }

    const { width, height } = this.preferredResolution;

    if (createNew) {
      const element = this._surface.createElement('video');
      setAutoplayInline(element);
      const video = castPresentation(element, 'HtmlVideoElement');
      video.width = width;
      video.height = height;
      video.srcObject = this._stream;

      let appended: SurfaceElement;
      try {
        appended = target.appendChild(video);
      } catch (error) {
        throw new StructureError('Attach Error', describeError(error));
      }
      this._attachedNode = castPresentation(appended, 'HtmlVideoElement');
    } else {
      setAutoplayInline(target);
      const video = castPresentation(target, 'HtmlVideoElement');
      video.width = width;
      video.height = height;
      video.srcObject = this._stream;
      this._attachedNode = video;
    }

    this._attached = true;
    logger.debug(`Attached to #${targetId} at ${width}x${height}`);
  }

  /**
   * Unbind the stream from the attached element. No-op when detached.
   */
  deAttach(): void {
    validateNotClosed(this._state, 'CaptureSession');
    this._detach();
  }

  private _detach(): void {
    if (!this._attached) {
      return;
    }
    const node = this._attachedNode;
    if (node) {
      castPresentation(node, 'HtmlVideoElement').srcObject = null;
    }
    this._attachedNode = null;
    this._attached = false;
  }

  /**
   * Draw the stream's current picture and read it back as RGBA.
   * Nothing is cached here: every call draws whatever the stream shows now.
   */
  frameRaw(): Uint8Array {
    validateNotClosed(this._state, 'CaptureSession');

    const { width, height } = this.preferredResolution;
    const context = this._createContext(width, height);

    let temporary: PresentationElement | null = null;
    let source: PresentationElement;
    if (this._attached && this._attachedNode) {
      source = this._attachedNode;
    } else {
      const element = this._surface.createElement('video');
      setAutoplayInline(element);
      temporary = castPresentation(element, 'HtmlVideoElement');
      source = temporary;
    }
    source.width = width;
    source.height = height;
    source.srcObject = this._stream;

    try {
      context.drawImage(source, 0, 0, width, height);
    } catch (error) {
      throw new ReadFrameError(`Failed to draw: ${describeError(error)}`);
    } finally {
      if (temporary) {
        temporary.srcObject = null;
      }
    }

    let imageData: unknown;
    try {
      imageData = context.getImageData(0, 0, width, height);
    } catch (error) {
      throw new ReadFrameError(`Failed to get image data: ${describeError(error)}`);
    }
    if (!isImageDataLike(imageData)) {
      throw new ReadFrameError('Failed to get image data: not an ImageData');
    }

    return toUint8Array(imageData.data);
  }

  private _createContext(width: number, height: number): DrawingContext2D {
    let context: unknown;
    try {
      context = this._surface.createCanvas(width, height).getContext('2d');
    } catch (error) {
      throw new StructureError('HtmlCanvasElement', describeError(error));
    }
    if (context === null || context === undefined) {
      throw new StructureError('HtmlCanvasElement Context 2D', 'None');
    }
    if (!isDrawingContext2D(context)) {
      throw new StructureError('HtmlCanvasElement Context 2D', 'Cannot Cast');
    }
    return context;
  }

  private _readFrame(layout: PixelLayout): PixelBuffer {
    const { width, height } = this.preferredResolution;
    const rgba = this.frameRaw();
    const expected = getFrameBufferSize('RGBA8888', width, height);
    if (rgba.length !== expected) {
      throw new ReadFrameError(`Read ${rgba.length} bytes, expected ${expected} for ${width}x${height}`);
    }

    const data = layout === 'RGB888' ? rgbaToRgb888(rgba) : rgba;
    return { data, format: layout, width, height };
  }

  /**
   * Current picture as packed RGB888
   */
  frame(): PixelBuffer {
    return this._readFrame('RGB888');
  }

  /**
   * Current picture as packed RGBA8888
   */
  rgbaFrame(): PixelBuffer {
    return this._readFrame('RGBA8888');
  }

  minBufferSize(useRgba: boolean): number {
    const { width, height } = this.preferredResolution;
    return getFrameBufferSize(useRgba ? 'RGBA8888' : 'RGB888', width, height);
  }

  /**
   * Read a frame into `buffer`, returning the number of bytes written.
   * Nothing is written when the buffer is too small.
   */
  writeFrameToBuffer(buffer: Uint8Array, convertRgba: boolean): number {
    validateNotClosed(this._state, 'CaptureSession');

    const required = this.minBufferSize(convertRgba);
    if (buffer.length < required) {
      throw new ReadFrameError(`Buffer of ${buffer.length} bytes is smaller than frame size ${required}`);
    }

    const frame = this._readFrame(convertRgba ? 'RGBA8888' : 'RGB888');
    if (buffer.length < frame.data.length) {
      throw new ReadFrameError(`Buffer of ${buffer.length} bytes is smaller than frame size ${frame.data.length}`);
    }
    buffer.set(frame.data);
    return frame.data.length;
  }

  /**
   * Detach and stop every track. Safe to call more than once.
   */
  close(): void {
    if (this._state === 'closed') {
      return;
    }
    this._state = 'closed';
    abandonedStreams.unregister(this);
    try {
      this._detach();
    } finally {
      stopTracks(this._stream);
      logger.debug('Closed');
    }
  }
}
