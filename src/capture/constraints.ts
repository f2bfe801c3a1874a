/**
 * Media stream constraints
 *
 * A ConstraintsBuilder collects directives as plain data; build() renders them
 * into the getUserMedia request. Each field renders as
 * `"field": { "exact": v }` or `"field": { "ideal": v }`, and a field holding its
 * empty value renders nothing, whatever its exact flag.
 *
 * deviceId and groupId are spliced verbatim between quotes into the request
 * text. Pass only identifiers obtained from the host's own device listing: a
 * quote in an identifier makes build() fail, and a crafted one can rewrite the
 * request.
 */

import {
  StructureError,
  describeError,
} from '../types/errors.js';
import { Resolution } from '../types/geometry.js';
import type {
  ConstraintDirective,
  MediaStreamConstraintsRequest,
  VideoConstraintsRequest,
} from '../types/media.js';

export type FacingMode = 'any' | 'environment' | 'user' | 'left' | 'right';

export type ResizeMode = 'any' | 'none' | 'crop-and-scale';

export type SupportedConstraint =
  | 'deviceId'
  | 'groupId'
  | 'aspectRatio'
  | 'facingMode'
  | 'frameRate'
  | 'height'
  | 'width'
  | 'resizeMode';

export const SUPPORTED_CONSTRAINTS: readonly SupportedConstraint[] = [
  'deviceId',
  'groupId',
  'aspectRatio',
  'facingMode',
  'frameRate',
  'height',
  'width',
  'resizeMode',
];

export function parseSupportedConstraint(name: string): SupportedConstraint | null {
  return SUPPORTED_CONSTRAINTS.find((constraint) => constraint === name) ?? null;
}

export interface ConstraintDirectives {
  resolution: Resolution;
  resolutionExact: boolean;
  aspectRatio: number;
  aspectRatioExact: boolean;
  facingMode: FacingMode;
  facingModeExact: boolean;
  frameRate: number;
  frameRateExact: boolean;
  resizeMode: ResizeMode;
  resizeModeExact: boolean;
  deviceId: string;
  deviceIdExact: boolean;
  groupId: string;
  groupIdExact: boolean;
}

const EMPTY_DIRECTIVES: Readonly<ConstraintDirectives> = Object.freeze({
  resolution: new Resolution(0, 0),
  resolutionExact: false,
  aspectRatio: 0,
  aspectRatioExact: false,
  facingMode: 'any',
  facingModeExact: false,
  frameRate: 0,
  frameRateExact: false,
  resizeMode: 'any',
  resizeModeExact: false,
  deviceId: '',
  deviceIdExact: false,
  groupId: '',
  groupIdExact: false,
});

function renderDirective(field: SupportedConstraint, value: string, exact: boolean, empty: boolean): string {
  if (empty) {
    return '';
  }
  return `"${field}": { "${exact ? 'exact' : 'ideal'}": ${value} }`;
}

/**
 * Render each non-empty directive as a request fragment, sorted and deduplicated
 */
export function renderConstraintFragments(directives: ConstraintDirectives): string[] {
  const d = directives;
  const fragments = [
    renderDirective('width', String(d.resolution.width), d.resolutionExact, d.resolution.width === 0),
    renderDirective('height', String(d.resolution.height), d.resolutionExact, d.resolution.height === 0),
    renderDirective('aspectRatio', String(d.aspectRatio), d.aspectRatioExact, d.aspectRatio === 0),
    renderDirective('facingMode', JSON.stringify(d.facingMode), d.facingModeExact, d.facingMode === 'any'),
    renderDirective('frameRate', String(d.frameRate), d.frameRateExact, d.frameRate === 0),
    renderDirective('resizeMode', JSON.stringify(d.resizeMode), d.resizeModeExact, d.resizeMode === 'any'),
    renderDirective('deviceId', `"${d.deviceId}"`, d.deviceIdExact, d.deviceId === ''),
    renderDirective('groupId', `"${d.groupId}"`, d.groupIdExact, d.groupId === ''),
  ];

  return [...new Set(fragments.filter((fragment) => fragment !== ''))].sort();
}

function isConstraintDirective(value: unknown): value is ConstraintDirective {
  if (!value || typeof value !== 'object' || Array.isArray(value)) return false;
  const entries = Object.entries(value);
  if (entries.length !== 1) return false;
  const [key, inner] = entries[0];
  return (key === 'exact' || key === 'ideal') && (typeof inner === 'string' || typeof inner === 'number');
}

function toVideoConstraints(value: unknown): VideoConstraintsRequest | null {
  if (!value || typeof value !== 'object' || Array.isArray(value)) return null;
  const video: VideoConstraintsRequest = {};
  for (const [field, directive] of Object.entries(value)) {
    if (!isConstraintDirective(directive)) return null;
    video[field] = directive;
  }
  return video;
}

/**
 * Assemble fragments into a request
 */
export function buildConstraintsRequest(fragments: readonly string[]): MediaStreamConstraintsRequest {
  if (fragments.length === 0) {
    return { audio: false, video: true };
  }

  const text = `{ "audio": false, "video": { ${fragments.join(', ')} } }`;
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new StructureError('MediaStreamConstraints', describeError(error));
  }

  const video = parsed && typeof parsed === 'object' && 'video' in parsed ? toVideoConstraints(parsed.video) : null;
  if (!video) {
    throw new StructureError('MediaStreamConstraints', `Unexpected request shape: ${text}`);
  }
  return { audio: false, video };
}

/**
 * Immutable snapshot of rendered constraints
 */
export class Constraints {
  readonly directives: Readonly<ConstraintDirectives>;
  readonly fragments: readonly string[];
  readonly request: Readonly<MediaStreamConstraintsRequest>;

  constructor(directives: ConstraintDirectives) {
    const fragments = renderConstraintFragments(directives);
    this.request = deepFreeze(buildConstraintsRequest(fragments));
    this.fragments = Object.freeze(fragments);
    this.directives = Object.freeze({ ...directives });
  }

  static unconstrained(): Constraints {
    return new ConstraintsBuilder().build();
  }

  get resolution(): Resolution {
    return this.directives.resolution;
  }

  get resolutionExact(): boolean {
    return this.directives.resolutionExact;
  }

  get aspectRatio(): number {
    return this.directives.aspectRatio;
  }

  get aspectRatioExact(): boolean {
    return this.directives.aspectRatioExact;
  }

  get facingMode(): FacingMode {
    return this.directives.facingMode;
  }

  get facingModeExact(): boolean {
    return this.directives.facingModeExact;
  }

  get frameRate(): number {
    return this.directives.frameRate;
  }

  get frameRateExact(): boolean {
    return this.directives.frameRateExact;
  }

  get resizeMode(): ResizeMode {
    return this.directives.resizeMode;
  }

  get resizeModeExact(): boolean {
    return this.directives.resizeModeExact;
  }

  get deviceId(): string {
    return this.directives.deviceId;
  }

  get deviceIdExact(): boolean {
    return this.directives.deviceIdExact;
  }

  get groupId(): string {
    return this.directives.groupId;
  }

  get groupIdExact(): boolean {
    return this.directives.groupIdExact;
  }

  isUnconstrained(): boolean {
    return this.fragments.length === 0;
  }

  /**
   * Start a builder from this snapshot, for rebuild-and-swap
   */
  toBuilder(): ConstraintsBuilder {
    return new ConstraintsBuilder(this.directives);
  }
}

function deepFreeze<T extends object>(value: T): T {
  for (const entry of Object.values(value)) {
    const inner: unknown = entry;
    if (inner && typeof inner === 'object') {
      deepFreeze(inner);
    }
  }
  return Object.freeze(value);
}

/**
 * Immutable builder: each setter returns a new builder.
 * Values are not range checked; the host decides what it can satisfy.
 */
export class ConstraintsBuilder {
  private readonly _directives: Readonly<ConstraintDirectives>;

  constructor(directives: Readonly<ConstraintDirectives> = EMPTY_DIRECTIVES) {
    this._directives = directives;
  }

  get directives(): Readonly<ConstraintDirectives> {
    return this._directives;
  }

  private _with(patch: Partial<ConstraintDirectives>): ConstraintsBuilder {
    return new ConstraintsBuilder(Object.freeze({ ...this._directives, ...patch }));
  }

  resolution(resolution: Resolution, exact = false): ConstraintsBuilder {
    return this._with({ resolution, resolutionExact: exact });
  }

  aspectRatio(aspectRatio: number, exact = false): ConstraintsBuilder {
    return this._with({ aspectRatio, aspectRatioExact: exact });
  }

  facingMode(facingMode: FacingMode, exact = false): ConstraintsBuilder {
    return this._with({ facingMode, facingModeExact: exact });
  }

  frameRate(frameRate: number, exact = false): ConstraintsBuilder {
    return this._with({ frameRate, frameRateExact: exact });
  }

  resizeMode(resizeMode: ResizeMode, exact = false): ConstraintsBuilder {
    return this._with({ resizeMode, resizeModeExact: exact });
  }

  deviceId(deviceId: string, exact = false): ConstraintsBuilder {
    return this._with({ deviceId, deviceIdExact: exact });
  }

  groupId(groupId: string, exact = false): ConstraintsBuilder {
    return this._with({ groupId, groupIdExact: exact });
  }

  build(): Constraints {
    return new Constraints({ ...this._directives });
  }
}
