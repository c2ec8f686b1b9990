/**
 * Astronomical primitives: Julian dates, solar position and hour angles.
 */

export * from './angles.js';
export * from './julianDate.js';
export * from './solarPosition.js';
export * from './hourAngle.js';
