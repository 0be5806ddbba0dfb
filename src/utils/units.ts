/**
 * Unit conversions from the simulator's metric readouts to the aviation units
 * used by the phase rules and the wire payload.
 */

export const KNOTS_PER_MS = 1.94384;
export const FEET_PER_METRE = 3.28084;
export const METRES_PER_NM = 1852;
export const FPM_PER_MS = 196.85;

export const knots = (metresPerSecond: number): number => metresPerSecond * KNOTS_PER_MS;

export const feet = (metres: number): number => metres * FEET_PER_METRE;

export const nauticalMiles = (metres: number): number => metres / METRES_PER_NM;

export const feetPerMinute = (metresPerSecond: number): number => metresPerSecond * FPM_PER_MS;

// `|| 0` folds NaN and -0 into 0 so neither reaches the wire
export const truncate = (value: number): number => Math.trunc(value) || 0;

export const ceilNonNegative = (value: number): number => Math.max(0, Math.ceil(value) || 0);

export const normalizeHeading = (degrees: number): number => {
  const whole = truncate(degrees) % 360;
  return (whole + 360) % 360;
};

/** Coerce a raw reading to a finite number; anything else reads as 0. */
export const finiteOrZero = (value: unknown): number => (
  typeof value === 'number' && Number.isFinite(value) ? value : 0
);
