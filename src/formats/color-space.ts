/**
 * Color space conversion
 */

function clamp(value: number): number {
  return value < 0 ? 0 : value > 255 ? 255 : value;
}

/**
 * Convert one YUV 4:4:4 sample to RGB with integer BT.601 studio-swing math.
 *
 * Results are bit-exact with the fixed-point formula:
 *   C = Y - 16, D = U - 128, E = V - 128
 *   R = (298C + 409E + 128) >> 8
 *   G = (298C - 100D - 208E + 128) >> 8
 *   B = (298C + 516D + 128) >> 8
 */
export function yuyv444ToRgb888(y: number, u: number, v: number): [number, number, number] {
  const c = (y - 16) * 298;
  const d = u - 128;
  const e = v - 128;

  const r = clamp((c + 409 * e + 128) >> 8);
  const g = clamp((c - 100 * d - 208 * e + 128) >> 8);
  const b = clamp((c + 516 * d + 128) >> 8);

  return [r, g, b];
}
