/**
 * Clock adapters: turn an instant and a timezone into calculation inputs.
 */

export * from './timeZone.js';
export * from './localDate.js';
