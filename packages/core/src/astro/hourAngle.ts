import { acosDeg, atanDeg, cosDeg, sinDeg, tanDeg } from './angles.js';

/**
 * Solves for the hour angle at which the sun reaches a given altitude.
 *
 * cos(H) = (sin(altitude) - sin(lat) * sin(dec)) / (cos(lat) * cos(dec))
 *
 * @param latitude - Observer latitude in degrees
 * @param declination - Solar declination in degrees
 * @param altitude - Target sun altitude in degrees (negative = below horizon)
 * @returns Hour angle in degrees in [0, 180], or undefined if the sun never reaches
 *          the altitude that day (polar day or night)
 */
export function hourAngleForAltitude(
  latitude: number,
  declination: number,
  altitude: number,
): number | undefined {
  const denominator = cosDeg(latitude) * cosDeg(declination);
  const cosH =
    (sinDeg(altitude) - sinDeg(latitude) * sinDeg(declination)) / denominator;

  // Also rejects NaN and the infinities produced at the poles
  if (!(cosH >= -1 && cosH <= 1)) {
    return undefined;
  }

  return acosDeg(cosH);
}

/**
 * Sun altitude at which an object's shadow equals its noon shadow plus
 * `shadowFactor` times its height.
 *
 * @returns Altitude in degrees, or undefined if the sun stays below the horizon at noon
 */
export function asrAltitude(
  latitude: number,
  declination: number,
  shadowFactor: number,
): number | undefined {
  const noonZenithDistance = Math.abs(latitude - declination);
  if (noonZenithDistance >= 90) {
    return undefined;
  }

  return atanDeg(1 / (shadowFactor + tanDeg(noonZenithDistance)));
}

/**
 * Solves for the afternoon hour angle of the Asr shadow condition.
 *
 * @param latitude - Observer latitude in degrees
 * @param declination - Solar declination in degrees
 * @param shadowFactor - 1 for the Shafi'i convention, 2 for Hanafi
 * @returns Hour angle in degrees, or undefined if there is no solution that day
 */
export function hourAngleForAsrShadow(
  latitude: number,
  declination: number,
  shadowFactor: number,
): number | undefined {
  const altitude = asrAltitude(latitude, declination, shadowFactor);
  if (altitude === undefined) {
    return undefined;
  }

  return hourAngleForAltitude(latitude, declination, altitude);
}
