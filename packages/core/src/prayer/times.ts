import type { PrayerName, PrayerTimeEntry, PrayerTimes } from '../domain/types.js';

/**
 * Applies a function to each of the six entries, preserving keys.
 */
export function mapPrayerTimes<T>(
  times: PrayerTimes,
  fn: (entry: PrayerTimeEntry, name: PrayerName) => T,
): Readonly<Record<PrayerName, T>> {
  return Object.freeze({
    fajr: fn(times.fajr, 'fajr'),
    sunrise: fn(times.sunrise, 'sunrise'),
    dhuhr: fn(times.dhuhr, 'dhuhr'),
    asr: fn(times.asr, 'asr'),
    maghrib: fn(times.maghrib, 'maghrib'),
    isha: fn(times.isha, 'isha'),
  });
}
