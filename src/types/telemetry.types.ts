/**
 * Telemetry type definitions shared by the phase machine, payload builder,
 * encoders and the receiver.
 */

/**
 * One consistent read of every simulator signal, in the simulator's raw units.
 * Produced once per tick by `readSnapshot` and never mutated afterwards.
 */
export interface SignalSnapshot {
  readonly onGround: boolean;
  readonly engineRunning: boolean;
  readonly paused: boolean;
  readonly groundSpeedMs: number;
  readonly indicatedAirspeedKt: number;
  readonly verticalSpeedMs: number;
  readonly radioAltitudeFt: number;
  readonly altitudeAglM: number;
  readonly flightTimeSec: number;
  readonly headingDeg: number;
  readonly distanceM: number;
  readonly fuelTanks: readonly number[];
  readonly fuelTotal: number;
  readonly latitude: number;
  readonly longitude: number;
  readonly elevationM: number;
}

export const FLIGHT_PHASES = [
  'BOARDING',
  'READY_TO_START',
  'PUSHBACK_TAXI_OUT',
  'TAXI',
  'TAKEOFF',
  'AIRBORNE',
  'ENROUTE',
  'APPROACH',
  'LANDING',
  'LANDED',
  'ON_BLOCK',
  'ARRIVED',
] as const;

export type FlightPhase = typeof FLIGHT_PHASES[number];

/**
 * PIREP status codes understood by the receiving service.
 */
export const WIRE_CODES = {
  PAUSED: 'PSD',
  BOARDING: 'BST',
  TAXI: 'TXI',
  TAKEOFF: 'TOF',
  ENROUTE: 'ENR',
  APPROACH: 'TEN',
  LANDING: 'LDG',
  ARRIVED: 'ARR',
} as const;

export type WireCode = typeof WIRE_CODES[keyof typeof WIRE_CODES];

export const PHASE_WIRE_CODES: Record<FlightPhase, WireCode> = {
  BOARDING: WIRE_CODES.BOARDING,
  READY_TO_START: WIRE_CODES.BOARDING,
  PUSHBACK_TAXI_OUT: WIRE_CODES.TAXI,
  TAXI: WIRE_CODES.TAXI,
  TAKEOFF: WIRE_CODES.TAKEOFF,
  AIRBORNE: WIRE_CODES.ENROUTE,
  ENROUTE: WIRE_CODES.ENROUTE,
  APPROACH: WIRE_CODES.APPROACH,
  LANDING: WIRE_CODES.LANDING,
  LANDED: WIRE_CODES.ARRIVED,
  ON_BLOCK: WIRE_CODES.ARRIVED,
  ARRIVED: WIRE_CODES.ARRIVED,
};

export interface PhaseMachineState {
  readonly phase: FlightPhase;
  /** Start of the running hysteresis window, or null when unset. */
  readonly timerStartMs: number | null;
  readonly lastReported: WireCode;
}

export interface TelemetryPosition {
  lat: number;
  lon: number;
  altitude_msl: number;
  altitude_agl: number;
  gs: number;
  ias: number;
  vs: number;
  heading: number;
  distance: number;
  sim_time: string;
}

export interface TelemetryPayload {
  status: WireCode;
  position: TelemetryPosition;
  fuel: number;
  flight_time: number;
}
