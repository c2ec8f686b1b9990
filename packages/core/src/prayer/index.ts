/**
 * Prayer time composition and helpers for its consumers.
 */

export * from './compose.js';
export * from './calculate.js';
export * from './times.js';
export * from './iqama.js';
export * from './nextPrayer.js';
export * from './format.js';
