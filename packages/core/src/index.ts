/**
 * Prayer time calculation engine.
 * Pure TypeScript with no I/O: every call is an independent computation.
 */

/**
 * Re-export domain types, validation schemas and errors.
 */
export * from './domain/index.js';

/**
 * Re-export astronomical primitives.
 */
export * from './astro/index.js';

/**
 * Re-export the calculation method registry.
 */
export * from './methods/index.js';

/**
 * Re-export prayer time composition, formatting and next-prayer helpers.
 */
export * from './prayer/index.js';

/**
 * Re-export clock adapters.
 */
export * from './clocks/index.js';

/**
 * Re-export settings parsing.
 */
export * from './settings/index.js';
