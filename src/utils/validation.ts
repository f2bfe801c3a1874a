/**
 * Input validation utilities
 */

import { StructureError } from '../types/errors.js';

/**
 * Validate that a value is a non-negative integer
 */
export function validateNonNegativeInteger(value: unknown, name: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new TypeError(`${name} must be a non-negative integer`);
  }
  return value;
}

/**
 * Validate that a value fits an unsigned 32-bit integer
 */
export function validateUint32(value: unknown, name: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value > 0xffffffff) {
    throw new TypeError(`${name} must be an unsigned 32-bit integer`);
  }
  return value;
}

/**
 * Validate a session is still open
 */
export function validateNotClosed(state: string, structure: string): void {
  if (state === 'closed') {
    throw new StructureError(structure, `${structure} is closed`);
  }
}
