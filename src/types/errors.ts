/**
 * Camera error model
 *
 * Every failure surfaced by the capture core is one of five flat kinds.
 * `kind` is a discriminant so callers can switch without instanceof.
 */

export type CameraErrorKind =
  | 'StructureError'
  | 'SetPropertyError'
  | 'ProcessFrameError'
  | 'ReadFrameError'
  | 'NotImplementedError';

export abstract class CameraError extends Error {
  abstract readonly kind: CameraErrorKind;
}

/**
 * A required object could not be obtained, cast, or built.
 */
export class StructureError extends CameraError {
  readonly kind = 'StructureError' as const;
  readonly structure: string;
  readonly detail: string;

  constructor(structure: string, detail: string) {
    super(`Could not get or cast ${structure}: ${detail}`);
    this.name = 'StructureError';
    this.structure = structure;
    this.detail = detail;
  }
}

/**
 * A property or attribute on a device or element could not be set.
 */
export class SetPropertyError extends CameraError {
  readonly kind = 'SetPropertyError' as const;
  readonly property: string;
  readonly value: string;
  readonly detail: string;

  constructor(property: string, value: string, detail: string) {
    super(`Could not set ${property} to ${value}: ${detail}`);
    this.name = 'SetPropertyError';
    this.property = property;
    this.value = value;
    this.detail = detail;
  }
}

/**
 * Pixel data could not be converted between two layouts.
 */
export class ProcessFrameError extends CameraError {
  readonly kind = 'ProcessFrameError' as const;
  readonly source: string;
  readonly destination: string;
  readonly detail: string;

  constructor(source: string, destination: string, detail: string) {
    super(`Could not process frame ${source} to ${destination}: ${detail}`);
    this.name = 'ProcessFrameError';
    this.source = source;
    this.destination = destination;
    this.detail = detail;
  }
}

export class ReadFrameError extends CameraError {
  readonly kind = 'ReadFrameError' as const;
  readonly detail: string;

  constructor(detail: string) {
    super(`Could not read frame: ${detail}`);
    this.name = 'ReadFrameError';
    this.detail = detail;
  }
}

export class NotImplementedError extends CameraError {
  readonly kind = 'NotImplementedError' as const;
  readonly feature: string;

  constructor(feature: string) {
    super(`${feature} is not implemented`);
    this.name = 'NotImplementedError';
    this.feature = feature;
  }
}

export function isCameraError(value: unknown): value is CameraError {
  return value instanceof CameraError;
}

/**
 * Render a thrown value for an error detail field
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.name && error.name !== 'Error' ? `${error.name}: ${error.message}` : error.message;
  }
  return String(error);
}
