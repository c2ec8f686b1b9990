/**
 * Domain module public exports.
 * Value types, boundary validation and errors shared by every other module.
 */

// Types
export type {
  GeoCoordinate,
  CalculationDate,
  PrayerName,
  AsrJuristic,
  PrayerTimeOfDay,
  NoSolution,
  PrayerTimeEntry,
  PrayerTimes,
} from './types.js';

export {
  PRAYER_NAMES,
  NO_SOLUTION,
  timeOfDay,
  entryMinutes,
} from './types.js';

// Errors
export type { PrayerTimesErrorCode } from './errors.js';
export { PrayerTimesError, isPrayerTimesError } from './errors.js';

// Validation schemas
export {
  MAX_UTC_OFFSET_MINUTES,
  isLeapYear,
  daysInMonth,
  geoCoordinateSchema,
  calculationDateSchema,
  asrJuristicSchema,
} from './validation.js';
