import { PrayerTimesError } from '../domain/errors.js';
import type { AsrJuristic } from '../domain/types.js';
import type {
  CalculationMethod,
  IshaRule,
  MethodId,
  MethodParameters,
} from './types.js';
import { METHOD_IDS } from './types.js';

/**
 * Shadow factor for each Asr convention.
 */
export const ASR_SHADOW_FACTORS: Readonly<Record<AsrJuristic, number>> =
  Object.freeze({
    shafii: 1,
    hanafi: 2,
  });

const NO_ADJUSTMENTS = Object.freeze({ dhuhrMinutes: 0, maghribMinutes: 0 });

function defineMethod(
  id: MethodId,
  name: string,
  fajrAngle: number,
  isha: IshaRule,
): CalculationMethod {
  return Object.freeze({
    id,
    name,
    fajrAngle,
    isha: Object.freeze(isha),
    adjustments: NO_ADJUSTMENTS,
  });
}

/**
 * The fixed method table. Read-only for the lifetime of the process.
 */
export const CALCULATION_METHODS: Readonly<Record<MethodId, CalculationMethod>> =
  Object.freeze({
    muslimWorldLeague: defineMethod(
      'muslimWorldLeague',
      'Muslim World League',
      18,
      { kind: 'angle', degrees: 17 },
    ),
    isna: defineMethod(
      'isna',
      'Islamic Society of North America',
      15,
      { kind: 'angle', degrees: 15 },
    ),
    egypt: defineMethod(
      'egypt',
      'Egyptian General Authority of Survey',
      19.5,
      { kind: 'angle', degrees: 17.5 },
    ),
    ummAlQura: defineMethod(
      'ummAlQura',
      'Umm al-Qura University, Makkah',
      18.5,
      { kind: 'offset', minutes: 90 },
    ),
    karachi: defineMethod(
      'karachi',
      'University of Islamic Sciences, Karachi',
      18,
      { kind: 'angle', degrees: 18 },
    ),
  });

/**
 * Type guard for MethodId.
 */
export function isMethodId(value: unknown): value is MethodId {
  return (
    typeof value === 'string' &&
    Object.prototype.hasOwnProperty.call(CALCULATION_METHODS, value)
  );
}

/**
 * All methods in registry order.
 */
export function listMethods(): readonly CalculationMethod[] {
  return METHOD_IDS.map((id) => CALCULATION_METHODS[id]);
}

/**
 * Looks up a registry entry.
 *
 * @throws PrayerTimesError with code UnknownMethod if methodId is not registered
 */
export function methodFor(methodId: string): CalculationMethod {
  if (!isMethodId(methodId)) {
    throw new PrayerTimesError(
      'UnknownMethod',
      `Unknown calculation method: ${methodId}`,
    );
  }
  return CALCULATION_METHODS[methodId];
}

/**
 * Resolves the composer parameters for a method.
 *
 * @param methodId - Registered method identifier
 * @param asrChoice - Asr convention; overrides the factor independently of the method (default: shafii)
 * @throws PrayerTimesError with code UnknownMethod if methodId is not registered,
 * or InvalidAsrChoice if asrChoice is not a known convention
 *
 * @example
 * parametersFor('ummAlQura')
 * // { fajrAngle: 18.5, isha: { kind: 'offset', minutes: 90 }, asrFactor: 1 }
 */
export function parametersFor(
  methodId: string,
  asrChoice: AsrJuristic = 'shafii',
): MethodParameters {
  const method = methodFor(methodId);
  if (!Object.prototype.hasOwnProperty.call(ASR_SHADOW_FACTORS, asrChoice)) {
    throw new PrayerTimesError(
      'InvalidAsrChoice',
      `Unknown Asr convention: ${String(asrChoice)}`,
    );
  }
  return Object.freeze({
    fajrAngle: method.fajrAngle,
    isha: method.isha,
    asrFactor: ASR_SHADOW_FACTORS[asrChoice],
  });
}
