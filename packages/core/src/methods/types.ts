/**
 * Calculation method identifiers, in registry order.
 */
export const METHOD_IDS = [
  'muslimWorldLeague',
  'isna',
  'egypt',
  'ummAlQura',
  'karachi',
] as const;

export type MethodId = (typeof METHOD_IDS)[number];

/**
 * How Isha is determined (discriminated union).
 * - angle: the sun's depression below the horizon, in degrees
 * - offset: a fixed number of minutes after Maghrib
 */
export type IshaRule =
  | { readonly kind: 'angle'; readonly degrees: number }
  | { readonly kind: 'offset'; readonly minutes: number };

/**
 * Parameters consumed by the prayer time composer.
 */
export interface MethodParameters {
  /** Twilight depression angle for Fajr, in degrees (positive) */
  readonly fajrAngle: number;
  readonly isha: IshaRule;
  /** Asr shadow factor: 1 (Shafi'i) or 2 (Hanafi) */
  readonly asrFactor: number;
}

/**
 * Per-method minute adjustments applied after the astronomical solution.
 */
export interface MethodAdjustments {
  readonly dhuhrMinutes: number;
  readonly maghribMinutes: number;
}

/**
 * Registry entry for one calculation method.
 */
export interface CalculationMethod {
  readonly id: MethodId;
  readonly name: string;
  readonly fajrAngle: number;
  readonly isha: IshaRule;
  readonly adjustments: MethodAdjustments;
}
