import {
  WIRE_CODES,
  type FlightPhase,
  type WireCode,
} from '../types/telemetry.types';

/**
 * Signals in the units the phase rules are written in.
 */
export interface RuleSignals {
  onGround: boolean;
  engineRunning: boolean;
  groundSpeedKt: number;
  iasKt: number;
  verticalSpeedFpm: number;
  radioAltitudeFt: number;
  altitudeAglFt: number;
  flightTimeSec: number;
}

export interface PhaseThresholds {
  /** Below this the aircraft counts as stopped. */
  stationaryGsKt: number;
  /** Taxi-out is confirmed once ground speed stays above this for the taxi dwell. */
  taxiGsKt: number;
  /** Fallback only: on-ground speed treated as taxiing. */
  movingGsKt: number;
  /** Touchdown is accepted once the rollout has slowed below this. */
  rolloutGsKt: number;
  /** AGL readings below this are "on the ground" for boarding and landing checks. */
  groundAglFt: number;
  rotateIasKt: number;
  liftoffVsFpm: number;
  climbAglFt: number;
  climbVsFpm: number;
  cruiseAglFt: number;
  cruiseGsKt: number;
  approachAglFt: number;
  approachVsFpm: number;
  approachRadioAltFt: number;
  flareAglFt: number;
  flareVsFpm: number;
  flareRadioAltFt: number;
  /** Fallback only: airborne below this radio altitude reports takeoff. */
  lowRadioAltFt: number;
  /** Minimum simulator flight time before an on-block aircraft counts as arrived. */
  minBlockTimeSec: number;
}

export const DEFAULT_THRESHOLDS: PhaseThresholds = {
  stationaryGsKt: 1,
  taxiGsKt: 5,
  movingGsKt: 1.5,
  rolloutGsKt: 30,
  groundAglFt: 30,
  rotateIasKt: 50,
  liftoffVsFpm: 100,
  climbAglFt: 100,
  climbVsFpm: 200,
  cruiseAglFt: 1000,
  cruiseGsKt: 50,
  approachAglFt: 5000,
  approachVsFpm: -500,
  approachRadioAltFt: 2000,
  flareAglFt: 100,
  flareVsFpm: -100,
  flareRadioAltFt: 50,
  lowRadioAltFt: 100,
  minBlockTimeSec: 60,
};

export interface PhaseDwell {
  taxiStartMs: number;
  fullStopMs: number;
}

export const DEFAULT_DWELL: PhaseDwell = {
  taxiStartMs: 5000,
  fullStopMs: 10000,
};

type Guard = (signals: RuleSignals, thresholds: PhaseThresholds) => boolean;

export interface PhaseTransition {
  from: FlightPhase;
  description: string;
  when: Guard;
  /** Next phase, or a resolver when the target depends on the signals. */
  to: FlightPhase | ((signals: RuleSignals, thresholds: PhaseThresholds) => FlightPhase);
  /** Code to report; omitted means repeat the last reported code. */
  report?: WireCode;
  timer?: 'start' | 'clear';
  /** Hysteresis: the row also needs this dwell to have elapsed on the phase timer. */
  dwell?: keyof PhaseDwell;
}

const isStationary: Guard = (s, t) => s.groundSpeedKt < t.stationaryGsKt;
const isAboveTaxiSpeed: Guard = (s, t) => s.groundSpeedKt > t.taxiGsKt;

const hold = (
  from: FlightPhase,
  description: string,
  when: Guard,
  timer?: 'start',
): PhaseTransition => ({
  from,
  description,
  when,
  to: from,
  timer,
});

/**
 * Ordered transition table; the first row whose `from` and guard match wins.
 * Hold rows keep the phase so steady flight does not drop into the fallback.
 */
export const PHASE_TRANSITIONS: readonly PhaseTransition[] = [
  {
    from: 'BOARDING',
    description: 'parked with engines off',
    when: (s, t) => s.onGround && !s.engineRunning && isStationary(s, t) && s.altitudeAglFt < t.groundAglFt,
    to: 'READY_TO_START',
    report: WIRE_CODES.BOARDING,
  },
  hold('BOARDING', 'boarding on the ground', (s) => s.onGround),

  {
    from: 'READY_TO_START',
    description: 'engine started while stationary',
    when: (s, t) => s.onGround && s.engineRunning && isStationary(s, t),
    to: 'PUSHBACK_TAXI_OUT',
    report: WIRE_CODES.BOARDING,
    timer: 'start',
  },
  hold('READY_TO_START', 'waiting for engine start', (s) => s.onGround),

  {
    from: 'PUSHBACK_TAXI_OUT',
    description: 'taxi speed held for the taxi dwell',
    when: (s, t) => s.onGround && isAboveTaxiSpeed(s, t),
    to: 'TAXI',
    report: WIRE_CODES.TAXI,
    timer: 'clear',
    dwell: 'taxiStartMs',
  },
  hold('PUSHBACK_TAXI_OUT', 'taxi speed not yet held long enough', (s, t) => s.onGround && isAboveTaxiSpeed(s, t)),
  hold('PUSHBACK_TAXI_OUT', 'below taxi speed, dwell restarts', (s) => s.onGround, 'start'),

  {
    from: 'TAXI',
    description: 'takeoff roll with positive climb',
    when: (s, t) => s.onGround && s.iasKt > t.rotateIasKt && s.verticalSpeedFpm > t.liftoffVsFpm,
    to: 'TAKEOFF',
    report: WIRE_CODES.TAKEOFF,
  },
  {
    from: 'TAXI',
    description: 'liftoff happened between samples',
    when: (s, t) => !s.onGround && s.iasKt > t.rotateIasKt,
    to: 'TAKEOFF',
    report: WIRE_CODES.TAKEOFF,
  },
  hold('TAXI', 'taxiing', (s) => s.onGround && s.engineRunning),

  {
    from: 'TAKEOFF',
    description: 'climbing away from the runway',
    when: (s, t) => !s.onGround && s.altitudeAglFt > t.climbAglFt && s.verticalSpeedFpm > t.climbVsFpm,
    // Already at cruise-like altitude and speed: skip the intermediate airborne phase
    to: (s, t) => (s.altitudeAglFt > t.cruiseAglFt && s.groundSpeedKt > t.cruiseGsKt ? 'ENROUTE' : 'AIRBORNE'),
    report: WIRE_CODES.ENROUTE,
  },
  hold('TAKEOFF', 'initial climb', () => true),

  {
    from: 'AIRBORNE',
    description: 'cruise altitude and speed reached',
    when: (s, t) => !s.onGround && s.altitudeAglFt > t.cruiseAglFt && s.groundSpeedKt > t.cruiseGsKt,
    to: 'ENROUTE',
    report: WIRE_CODES.ENROUTE,
  },
  hold('AIRBORNE', 'climbing', (s) => !s.onGround),

  {
    from: 'ENROUTE',
    description: 'descending through approach altitude',
    when: (s, t) => !s.onGround
      && s.altitudeAglFt < t.approachAglFt
      && s.verticalSpeedFpm < t.approachVsFpm
      && s.radioAltitudeFt < t.approachRadioAltFt,
    to: 'APPROACH',
    report: WIRE_CODES.APPROACH,
  },
  hold('ENROUTE', 'enroute', (s) => !s.onGround),

  {
    from: 'APPROACH',
    description: 'flare height',
    when: (s, t) => !s.onGround
      && s.altitudeAglFt < t.flareAglFt
      && s.verticalSpeedFpm < t.flareVsFpm
      && s.radioAltitudeFt < t.flareRadioAltFt,
    to: 'LANDING',
    report: WIRE_CODES.LANDING,
  },
  hold('APPROACH', 'on approach', (s) => !s.onGround),

  {
    from: 'LANDING',
    description: 'touchdown and rollout',
    when: (s, t) => s.onGround && s.groundSpeedKt < t.rolloutGsKt && s.altitudeAglFt < t.groundAglFt,
    to: 'LANDED',
    report: WIRE_CODES.ARRIVED,
    timer: 'start',
  },
  hold('LANDING', 'landing', () => true),

  {
    from: 'LANDED',
    description: 'stopped for the full-stop dwell',
    when: (s, t) => s.onGround && isStationary(s, t),
    to: 'ON_BLOCK',
    report: WIRE_CODES.ARRIVED,
    timer: 'clear',
    dwell: 'fullStopMs',
  },
  hold('LANDED', 'stopped, dwell running', (s, t) => s.onGround && isStationary(s, t)),
  hold('LANDED', 'taxiing in, dwell restarts', (s) => s.onGround, 'start'),

  {
    from: 'ON_BLOCK',
    description: 'on block after a real flight',
    when: (s, t) => s.onGround && isStationary(s, t) && s.flightTimeSec > t.minBlockTimeSec,
    to: 'ARRIVED',
    report: WIRE_CODES.ARRIVED,
  },
  hold('ON_BLOCK', 'on block', (s) => s.onGround),

  hold('ARRIVED', 'arrived', (s) => s.onGround),
];

export const resolveTarget = (
  transition: PhaseTransition,
  signals: RuleSignals,
  thresholds: PhaseThresholds,
): FlightPhase => (
  typeof transition.to === 'function' ? transition.to(signals, thresholds) : transition.to
);
