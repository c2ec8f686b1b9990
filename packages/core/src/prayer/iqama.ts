import type { PrayerName, PrayerTimes } from '../domain/types.js';
import { timeOfDay } from '../domain/types.js';
import { mapPrayerTimes } from './times.js';

/**
 * Per-prayer iqama offsets in minutes. Missing prayers are not shifted.
 */
export type IqamaOffsets = Readonly<Partial<Record<PrayerName, number>>>;

/**
 * Returns new prayer times with iqama offsets added.
 * NoSolution entries stay NoSolution.
 *
 * @example
 * applyIqamaOffsets(times, { fajr: 20, isha: 10 })
 */
export function applyIqamaOffsets(
  times: PrayerTimes,
  offsets: IqamaOffsets,
): PrayerTimes {
  return mapPrayerTimes(times, (entry, name) => {
    const offset = offsets[name] ?? 0;
    if (entry.kind === 'noSolution' || offset === 0) {
      return entry;
    }
    return timeOfDay(entry.minutes + offset);
  });
}
