import type { PrayerName, PrayerTimes } from '../domain/types.js';
import { PRAYER_NAMES } from '../domain/types.js';

const MINUTES_PER_DAY = 1440;

/**
 * The upcoming marker relative to a point in the local day.
 */
export interface NextPrayer {
  readonly name: PrayerName;
  /** Minutes since midnight of the day it falls on */
  readonly minutes: number;
  /** 0 = today, 1 = tomorrow */
  readonly dayOffset: 0 | 1;
}

function earliestAfter(
  times: PrayerTimes,
  afterMinutes: number,
): { name: PrayerName; minutes: number } | undefined {
  let best: { name: PrayerName; minutes: number } | undefined;
  for (const name of PRAYER_NAMES) {
    const entry = times[name];
    if (entry.kind !== 'time' || entry.minutes <= afterMinutes) {
      continue;
    }
    if (best === undefined || entry.minutes < best.minutes) {
      best = { name, minutes: entry.minutes };
    }
  }
  return best;
}

/**
 * Finds the next marker strictly after the current local time.
 * Wraps to the following day (normally its Fajr) once today's markers have passed.
 *
 * @param today - Prayer times for the current local date
 * @param nowMinutes - Current local time in minutes since midnight
 * @param tomorrow - Prayer times for the next date; today's are reused when omitted
 * @returns The next marker, or undefined if no entry has a solution
 */
export function findNextPrayer(
  today: PrayerTimes,
  nowMinutes: number,
  tomorrow: PrayerTimes = today,
): NextPrayer | undefined {
  const later = earliestAfter(today, nowMinutes);
  if (later !== undefined) {
    return { ...later, dayOffset: 0 };
  }

  const first = earliestAfter(tomorrow, -Infinity);
  if (first === undefined) {
    return undefined;
  }
  return { ...first, dayOffset: 1 };
}

/**
 * Minutes from nowMinutes (today) until the given marker.
 */
export function minutesUntil(next: NextPrayer, nowMinutes: number): number {
  return next.minutes + next.dayOffset * MINUTES_PER_DAY - nowMinutes;
}
