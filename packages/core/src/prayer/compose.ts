import { hourAngleForAltitude, hourAngleForAsrShadow } from '../astro/hourAngle.js';
import { toJulianDate } from '../astro/julianDate.js';
import { solarPosition } from '../astro/solarPosition.js';
import type {
  CalculationDate,
  GeoCoordinate,
  PrayerTimeEntry,
  PrayerTimes,
} from '../domain/types.js';
import { NO_SOLUTION, timeOfDay } from '../domain/types.js';
import type { MethodAdjustments, MethodParameters } from '../methods/types.js';

/**
 * Sun altitude at sunrise and sunset: atmospheric refraction plus the solar disk radius.
 */
export const SUNRISE_ALTITUDE = -0.833;

/**
 * Minutes of time per degree of hour angle (1440 minutes / 360 degrees).
 */
export const MINUTES_PER_DEGREE = 4;

const NOON_MINUTES = 12 * 60;

const NO_ADJUSTMENTS: MethodAdjustments = { dhuhrMinutes: 0, maghribMinutes: 0 };

/**
 * Local clock time of solar noon, in minutes since local midnight.
 *
 * @param longitude - Observer longitude in degrees (east positive)
 * @param equationOfTimeMinutes - Apparent minus mean solar time
 * @param utcOffsetMinutes - Local clock offset from UTC
 */
export function solarNoonMinutes(
  longitude: number,
  equationOfTimeMinutes: number,
  utcOffsetMinutes: number,
): number {
  const longitudeCorrectionMinutes = longitude * MINUTES_PER_DEGREE;
  return (
    NOON_MINUTES -
    longitudeCorrectionMinutes -
    equationOfTimeMinutes +
    utcOffsetMinutes
  );
}

function beforeNoon(noon: number, hourAngle: number | undefined): PrayerTimeEntry {
  return hourAngle === undefined
    ? NO_SOLUTION
    : timeOfDay(noon - hourAngle * MINUTES_PER_DEGREE);
}

function afterNoon(
  noon: number,
  hourAngle: number | undefined,
  adjustmentMinutes = 0,
): PrayerTimeEntry {
  return hourAngle === undefined
    ? NO_SOLUTION
    : timeOfDay(noon + hourAngle * MINUTES_PER_DEGREE + adjustmentMinutes);
}

/**
 * Composes the six daily markers for a validated coordinate and date.
 *
 * The sun's position is sampled once, at local noon of the calculation date.
 * A marker whose altitude the sun never reaches that day becomes NoSolution;
 * the others are still returned.
 *
 * @param coordinate - Observer position
 * @param date - Local date and UTC offset
 * @param parameters - Method parameters (angles, Isha rule, Asr factor)
 * @param adjustments - Per-method minute adjustments for Dhuhr and Maghrib
 * @returns Frozen PrayerTimes with minutes since local midnight
 */
export function composePrayerTimes(
  coordinate: GeoCoordinate,
  date: CalculationDate,
  parameters: MethodParameters,
  adjustments: MethodAdjustments = NO_ADJUSTMENTS,
): PrayerTimes {
  const { latitude, longitude } = coordinate;

  const localNoonUtcHour = 12 - date.utcOffsetMinutes / 60;
  const julianDate = toJulianDate(date.year, date.month, date.day, localNoonUtcHour);
  const { declination, equationOfTimeMinutes } = solarPosition(julianDate);

  const noon = solarNoonMinutes(longitude, equationOfTimeMinutes, date.utcOffsetMinutes);

  const horizonHourAngle = hourAngleForAltitude(latitude, declination, SUNRISE_ALTITUDE);

  const fajr = beforeNoon(
    noon,
    hourAngleForAltitude(latitude, declination, -parameters.fajrAngle),
  );
  const sunrise = beforeNoon(noon, horizonHourAngle);
  const dhuhr = timeOfDay(noon + adjustments.dhuhrMinutes);
  const asr = afterNoon(
    noon,
    hourAngleForAsrShadow(latitude, declination, parameters.asrFactor),
  );
  const maghrib = afterNoon(noon, horizonHourAngle, adjustments.maghribMinutes);

  let isha: PrayerTimeEntry;
  switch (parameters.isha.kind) {
    case 'angle':
      isha = afterNoon(
        noon,
        hourAngleForAltitude(latitude, declination, -parameters.isha.degrees),
      );
      break;
    case 'offset':
      isha =
        maghrib.kind === 'time'
          ? timeOfDay(maghrib.minutes + parameters.isha.minutes)
          : NO_SOLUTION;
      break;
    default: {
      // Exhaustive check - TypeScript will error if an IshaRule kind is missing
      const _exhaustive: never = parameters.isha;
      throw new Error(`Unknown Isha rule: ${JSON.stringify(_exhaustive)}`);
    }
  }

  return Object.freeze({ fajr, sunrise, dhuhr, asr, maghrib, isha });
}
