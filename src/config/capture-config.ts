import fs from 'fs';
import path from 'path';

import { isFrameFormat, type FrameFormat } from '../formats/frame-formats.js';
import { Resolution } from '../types/geometry.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('config');

/**
 * Level at which the JPEG decoder rejects a damaged frame
 */
export type MjpegFailOn = 'none' | 'truncated' | 'error' | 'warning';

export interface CaptureConfig {
  /** Used when neither the constraints nor the stream report a size */
  fallbackResolution: Resolution;
  defaultFrameRate: number;
  defaultFrameFormat: FrameFormat;
  mjpegFailOn: MjpegFailOn;
}

export type CaptureConfigOverrides = {
  fallbackResolution?: { width?: number; height?: number };
  defaultFrameRate?: number;
  defaultFrameFormat?: string;
  mjpegFailOn?: string;
};

export const DEFAULT_CAPTURE_CONFIG: Readonly<CaptureConfig> = Object.freeze({
  fallbackResolution: new Resolution(640, 480),
  defaultFrameRate: 15,
  defaultFrameFormat: 'MJPEG',
  mjpegFailOn: 'warning',
});

const FAIL_ON_LEVELS: readonly MjpegFailOn[] = ['none', 'truncated', 'error', 'warning'];

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge raw overrides onto the defaults, field by field.
 * Fields with the wrong type or range keep their default.
 */
export function sanitizeOverrides(raw: unknown): CaptureConfig {
  const config: CaptureConfig = { ...DEFAULT_CAPTURE_CONFIG };
  if (!isRecord(raw)) {
    return config;
  }

  const resolution = raw.fallbackResolution;
  if (isRecord(resolution) && isPositiveInteger(resolution.width) && isPositiveInteger(resolution.height)) {
    config.fallbackResolution = new Resolution(resolution.width, resolution.height);
  }
  if (isPositiveInteger(raw.defaultFrameRate)) {
    config.defaultFrameRate = raw.defaultFrameRate;
  }
  if (isFrameFormat(raw.defaultFrameFormat)) {
    config.defaultFrameFormat = raw.defaultFrameFormat;
  }
  const failOn = FAIL_ON_LEVELS.find((level) => level === raw.mjpegFailOn);
  if (failOn) {
    config.mjpegFailOn = failOn;
  }

  return config;
}

/**
 * Read overrides from a JSON file, falling back to defaults if it is missing or unreadable
 */
export function loadCaptureConfig(configPath?: string): CaptureConfig {
  const resolved = configPath
    ?? process.env.CAMCAP_CONFIG
    ?? path.join(process.cwd(), 'camcap.config.json');

  if (!fs.existsSync(resolved)) {
    return sanitizeOverrides(undefined);
  }

  try {
    const raw: unknown = JSON.parse(fs.readFileSync(resolved, 'utf8'));
    logger.debug(`Loaded overrides from ${resolved}`);
    return sanitizeOverrides(raw);
  } catch (error) {
    logger.warn(`Ignoring unreadable config ${resolved}`, error);
    return sanitizeOverrides(undefined);
  }
}

let cachedConfig: CaptureConfig | null = null;

export function getCaptureConfig(): CaptureConfig {
  if (!cachedConfig) {
    cachedConfig = loadCaptureConfig();
  }
  return cachedConfig;
}

/**
 * Drop the cached config so the next read reloads it
 */
export function resetCaptureConfig(): void {
  cachedConfig = null;
}
