/**
 * Format model and pixel codec
 */

export * from './frame-formats.js';
export * from './camera-format.js';
export * from './pixel-formats.js';
export * from './conversions/index.js';
