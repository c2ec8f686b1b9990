/**
 * Core value types for prayer time calculation.
 * All values are immutable; every calculation produces fresh objects.
 */

/**
 * Geographic position of the observer.
 */
export interface GeoCoordinate {
  /** Latitude in degrees, range [-90, 90] (north positive) */
  readonly latitude: number;
  /** Longitude in degrees, range [-180, 180] (east positive) */
  readonly longitude: number;
}

/**
 * Local calendar date to calculate for, with the local clock's offset from UTC.
 */
export interface CalculationDate {
  /** Proleptic Gregorian year, >= 1 */
  readonly year: number;
  /** Month in range [1, 12] */
  readonly month: number;
  /** Day of month, valid for the given month and year */
  readonly day: number;
  /** Local time minus UTC, in minutes (e.g. 180 for UTC+3, -300 for UTC-5) */
  readonly utcOffsetMinutes: number;
}

/**
 * The six daily markers, in chronological order for normal latitudes.
 */
export const PRAYER_NAMES = [
  'fajr',
  'sunrise',
  'dhuhr',
  'asr',
  'maghrib',
  'isha',
] as const;

export type PrayerName = (typeof PRAYER_NAMES)[number];

/**
 * Jurisprudential convention for the Asr shadow length.
 */
export type AsrJuristic = 'shafii' | 'hanafi';

/**
 * A marker that occurs at a local time of day.
 */
export interface PrayerTimeOfDay {
  readonly kind: 'time';
  /**
   * Minutes since local midnight. Real-valued and not wrapped: values past 1440
   * fall after the following midnight.
   */
  readonly minutes: number;
}

/**
 * A marker with no geometric solution on this date at this latitude
 * (the sun never reaches the required altitude).
 */
export interface NoSolution {
  readonly kind: 'noSolution';
}

/**
 * Prayer time entry (discriminated union).
 */
export type PrayerTimeEntry = PrayerTimeOfDay | NoSolution;

/**
 * Daily prayer times keyed by marker. Iterate with PRAYER_NAMES for chronological order.
 */
export type PrayerTimes = Readonly<Record<PrayerName, PrayerTimeEntry>>;

/**
 * Shared NoSolution marker.
 */
export const NO_SOLUTION: NoSolution = Object.freeze<NoSolution>({
  kind: 'noSolution',
});

/**
 * Creates a time entry.
 */
export function timeOfDay(minutes: number): PrayerTimeOfDay {
  return Object.freeze<PrayerTimeOfDay>({ kind: 'time', minutes });
}

/**
 * Returns the minutes of a time entry, or undefined for NoSolution.
 */
export function entryMinutes(entry: PrayerTimeEntry): number | undefined {
  return entry.kind === 'time' ? entry.minutes : undefined;
}
