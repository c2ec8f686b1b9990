/**
 * Degree-based trigonometry helpers.
 * Angles cross module boundaries in degrees; radians stay inside these helpers.
 */

const DEG_TO_RAD = Math.PI / 180;
const RAD_TO_DEG = 180 / Math.PI;

export function sinDeg(degrees: number): number {
  return Math.sin(degrees * DEG_TO_RAD);
}

export function cosDeg(degrees: number): number {
  return Math.cos(degrees * DEG_TO_RAD);
}

export function tanDeg(degrees: number): number {
  return Math.tan(degrees * DEG_TO_RAD);
}

export function asinDeg(value: number): number {
  return Math.asin(value) * RAD_TO_DEG;
}

export function acosDeg(value: number): number {
  return Math.acos(value) * RAD_TO_DEG;
}

export function atanDeg(value: number): number {
  return Math.atan(value) * RAD_TO_DEG;
}

export function atan2Deg(y: number, x: number): number {
  return Math.atan2(y, x) * RAD_TO_DEG;
}

/**
 * Normalizes an angle into [0, 360).
 *
 * @example
 * normalizeDegrees(370) // 10
 * normalizeDegrees(-10) // 350
 */
export function normalizeDegrees(degrees: number): number {
  const result = degrees % 360;
  return result < 0 ? result + 360 : result;
}

/**
 * Wraps an angle into [-180, 180).
 *
 * @example
 * wrapDegrees180(190) // -170
 * wrapDegrees180(-180) // -180
 */
export function wrapDegrees180(degrees: number): number {
  return normalizeDegrees(degrees + 180) - 180;
}
