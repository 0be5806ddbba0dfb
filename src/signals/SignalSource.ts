import type { SignalSnapshot } from '../types/telemetry.types';
import { finiteOrZero } from '../utils/units';

/**
 * Named simulator readouts. Units are the simulator's own:
 * speeds in m/s (indicated airspeed in knots), lengths in metres except the
 * radio altimeter (feet), flight time in seconds, flags as 0/1.
 */
export type SignalName =
  | 'onGround'
  | 'engineRunning'
  | 'paused'
  | 'groundSpeed'
  | 'indicatedAirspeed'
  | 'verticalSpeed'
  | 'radioAltitude'
  | 'altitudeAgl'
  | 'flightTime'
  | 'heading'
  | 'distance'
  | 'fuelQuantity'
  | 'latitude'
  | 'longitude'
  | 'elevation';

/**
 * Read-only access to the host's latest signal values.
 * Implementations return the last known value, or undefined when the signal
 * is unavailable; they must not block or throw.
 */
export interface SignalSource {
  read(signal: SignalName, index?: number): number | undefined;
}

export interface SnapshotOptions {
  fuelTankCount: number;
}

const FLAG_THRESHOLD = 0.5;

/**
 * Capture every signal once into an immutable snapshot. Missing, NaN and
 * infinite readings become 0 (and therefore false for flags).
 */
export function readSnapshot(source: SignalSource, options: SnapshotOptions): SignalSnapshot {
  const value = (signal: SignalName, index?: number): number => finiteOrZero(source.read(signal, index));
  const flag = (signal: SignalName): boolean => value(signal) >= FLAG_THRESHOLD;

  const fuelTanks = Object.freeze(
    Array.from({ length: options.fuelTankCount }, (_, tank) => value('fuelQuantity', tank)),
  );

  return Object.freeze({
    onGround: flag('onGround'),
    engineRunning: flag('engineRunning'),
    paused: flag('paused'),
    groundSpeedMs: value('groundSpeed'),
    indicatedAirspeedKt: value('indicatedAirspeed'),
    verticalSpeedMs: value('verticalSpeed'),
    radioAltitudeFt: value('radioAltitude'),
    altitudeAglM: value('altitudeAgl'),
    flightTimeSec: value('flightTime'),
    headingDeg: value('heading'),
    distanceM: value('distance'),
    fuelTanks,
    fuelTotal: fuelTanks.reduce((sum, quantity) => sum + quantity, 0),
    latitude: value('latitude'),
    longitude: value('longitude'),
    elevationM: value('elevation'),
  });
}
