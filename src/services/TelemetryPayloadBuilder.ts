import type { SignalSnapshot, TelemetryPayload, WireCode } from '../types/telemetry.types';
import {
  ceilNonNegative,
  feet,
  feetPerMinute,
  knots,
  nauticalMiles,
  normalizeHeading,
  truncate,
} from '../utils/units';

/**
 * UTC timestamp to the second with a literal Z, e.g. 2024-05-01T14:03:09Z.
 */
export const formatSimTime = (now: Date): string => now.toISOString().replace(/\.\d{3}Z$/, 'Z');

/**
 * Compose the wire payload for one send cycle.
 *
 * Speeds, fuel and elapsed time truncate toward zero. Altitudes round up,
 * and AGL altitude and distance never go below zero.
 */
export function buildTelemetryPayload(
  snapshot: SignalSnapshot,
  reported: WireCode,
  now: Date,
): TelemetryPayload {
  return {
    status: reported,
    position: {
      lat: snapshot.latitude,
      lon: snapshot.longitude,
      altitude_msl: Math.ceil(feet(snapshot.elevationM)) || 0,
      altitude_agl: ceilNonNegative(feet(snapshot.altitudeAglM)),
      gs: truncate(knots(snapshot.groundSpeedMs)),
      ias: Math.max(0, truncate(snapshot.indicatedAirspeedKt)),
      vs: truncate(feetPerMinute(snapshot.verticalSpeedMs)),
      heading: normalizeHeading(snapshot.headingDeg),
      distance: Math.max(0, truncate(nauticalMiles(snapshot.distanceM))),
      sim_time: formatSimTime(now),
    },
    fuel: truncate(snapshot.fuelTotal),
    flight_time: truncate(snapshot.flightTimeSec / 60),
  };
}
