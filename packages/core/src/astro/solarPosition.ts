import {
  asinDeg,
  atan2Deg,
  cosDeg,
  normalizeDegrees,
  sinDeg,
  wrapDegrees180,
} from './angles.js';
import { julianCenturiesSinceJ2000 } from './julianDate.js';

/**
 * Position of the sun relevant to daily prayer times.
 */
export interface SolarPosition {
  /** Solar declination in degrees, within about [-23.45, 23.45] */
  readonly declination: number;
  /**
   * Equation of time in minutes (apparent minus mean solar time), within about [-16, 16].
   * Positive when the true sun crosses the meridian before mean noon.
   */
  readonly equationOfTimeMinutes: number;
}

/**
 * Computes solar declination and the equation of time for a Julian Date.
 *
 * Uses truncated series for the sun's mean longitude, mean anomaly and the
 * obliquity of the ecliptic, with a three-term equation of center. Accuracy is
 * within a couple of minutes of time for prayer-time purposes.
 *
 * @param julianDate - Julian Date (UT)
 * @returns Declination in degrees and equation of time in minutes
 */
export function solarPosition(julianDate: number): SolarPosition {
  const t = julianCenturiesSinceJ2000(julianDate);

  const meanLongitude = normalizeDegrees(
    280.46646 + t * (36000.76983 + t * 0.0003032),
  );
  const meanAnomaly = normalizeDegrees(
    357.52911 + t * (35999.05029 - t * 0.0001537),
  );

  const equationOfCenter =
    (1.914602 - t * (0.004817 + t * 0.000014)) * sinDeg(meanAnomaly) +
    (0.019993 - t * 0.000101) * sinDeg(2 * meanAnomaly) +
    0.000289 * sinDeg(3 * meanAnomaly);

  const apparentLongitude = meanLongitude + equationOfCenter;
  const obliquity = 23.439291 - t * 0.0130042;

  const declination = asinDeg(sinDeg(obliquity) * sinDeg(apparentLongitude));

  const rightAscension = normalizeDegrees(
    atan2Deg(
      cosDeg(obliquity) * sinDeg(apparentLongitude),
      cosDeg(apparentLongitude),
    ),
  );

  // 1 degree of hour angle = 4 minutes of time
  const equationOfTimeMinutes = 4 * wrapDegrees180(meanLongitude - rightAscension);

  return { declination, equationOfTimeMinutes };
}
