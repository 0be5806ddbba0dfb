import {
  PHASE_WIRE_CODES,
  WIRE_CODES,
  type FlightPhase,
  type PhaseMachineState,
  type SignalSnapshot,
  type WireCode,
} from '../types/telemetry.types';
import {
  feet,
  feetPerMinute,
  finiteOrZero,
  knots,
} from '../utils/units';
import {
  DEFAULT_DWELL,
  DEFAULT_THRESHOLDS,
  PHASE_TRANSITIONS,
  resolveTarget,
  type PhaseDwell,
  type PhaseThresholds,
  type PhaseTransition,
  type RuleSignals,
} from './phaseTransitions';

export interface PhaseMachineOptions {
  thresholds?: Partial<PhaseThresholds>;
  dwell?: Partial<PhaseDwell>;
  transitions?: readonly PhaseTransition[];
}

interface ResolvedOptions {
  thresholds: PhaseThresholds;
  dwell: PhaseDwell;
  transitions: readonly PhaseTransition[];
}

/**
 * Everything known at the moment the fallback was taken.
 */
export interface PhaseFallbackDiagnostic {
  phase: FlightPhase;
  lastReported: WireCode;
  reported: WireCode;
  signals: RuleSignals;
  predicates: {
    onGround: boolean;
    engineRunning: boolean;
    stationary: boolean;
    moving: boolean;
    lowAgl: boolean;
    lowRadioAltitude: boolean;
  };
}

export interface PhaseStepResult {
  state: PhaseMachineState;
  /** Stored phase after the step. */
  phase: FlightPhase;
  reported: WireCode;
  transition?: PhaseTransition;
  fallback?: PhaseFallbackDiagnostic;
}

export const createInitialState = (phase: FlightPhase = 'BOARDING'): PhaseMachineState => ({
  phase,
  timerStartMs: null,
  lastReported: PHASE_WIRE_CODES[phase],
});

// Snapshots built outside readSnapshot may still carry NaN; read it as 0 here too
export const toRuleSignals = (snapshot: SignalSnapshot): RuleSignals => ({
  onGround: snapshot.onGround,
  engineRunning: snapshot.engineRunning,
  groundSpeedKt: knots(finiteOrZero(snapshot.groundSpeedMs)),
  iasKt: finiteOrZero(snapshot.indicatedAirspeedKt),
  verticalSpeedFpm: feetPerMinute(finiteOrZero(snapshot.verticalSpeedMs)),
  radioAltitudeFt: finiteOrZero(snapshot.radioAltitudeFt),
  altitudeAglFt: feet(finiteOrZero(snapshot.altitudeAglM)),
  flightTimeSec: finiteOrZero(snapshot.flightTimeSec),
});

const resolveOptions = (options: PhaseMachineOptions = {}): ResolvedOptions => ({
  thresholds: { ...DEFAULT_THRESHOLDS, ...options.thresholds },
  dwell: { ...DEFAULT_DWELL, ...options.dwell },
  transitions: options.transitions ?? PHASE_TRANSITIONS,
});

/**
 * Best-effort code derived from ground contact, speed and altitude alone.
 * It ignores the stored phase, so it can report an earlier code than the last one.
 */
export function fallbackPhaseCode(
  signals: RuleSignals,
  thresholds: PhaseThresholds,
  lastReported: WireCode,
): WireCode {
  if (signals.onGround && signals.groundSpeedKt < thresholds.stationaryGsKt) {
    return WIRE_CODES.ARRIVED;
  }
  if (signals.onGround && signals.groundSpeedKt >= thresholds.movingGsKt) {
    return WIRE_CODES.TAXI;
  }
  if (!signals.onGround && signals.radioAltitudeFt < thresholds.lowRadioAltFt) {
    return WIRE_CODES.TAKEOFF;
  }
  if (!signals.onGround) {
    return WIRE_CODES.ENROUTE;
  }
  return lastReported;
}

const dwellSatisfied = (
  transition: PhaseTransition,
  state: PhaseMachineState,
  nowMs: number,
  dwell: PhaseDwell,
): boolean => {
  if (!transition.dwell || state.timerStartMs === null) {
    return true;
  }
  return nowMs - state.timerStartMs >= dwell[transition.dwell];
};

const nextTimer = (transition: PhaseTransition, state: PhaseMachineState, nowMs: number): number | null => {
  switch (transition.timer) {
    case 'start':
      return nowMs;
    case 'clear':
      return null;
    default:
      return state.timerStartMs;
  }
};

/**
 * Advance the phase machine by one tick.
 *
 * Pause is an overlay: it reports PSD and returns the input state unchanged.
 * When no row matches, the fallback code is reported and only `lastReported`
 * changes, so a transient inconsistency heals on the next tick.
 */
export function stepFlightPhase(
  snapshot: SignalSnapshot,
  state: PhaseMachineState,
  nowMs: number,
  options: PhaseMachineOptions = {},
): PhaseStepResult {
  if (snapshot.paused) {
    return { state, phase: state.phase, reported: WIRE_CODES.PAUSED };
  }

  const { thresholds, dwell, transitions } = resolveOptions(options);
  const signals = toRuleSignals(snapshot);

  const transition = transitions.find((candidate) => candidate.from === state.phase
    && candidate.when(signals, thresholds)
    && dwellSatisfied(candidate, state, nowMs, dwell));

  if (transition) {
    const phase = resolveTarget(transition, signals, thresholds);
    const reported = transition.report ?? state.lastReported;
    return {
      state: {
        phase,
        timerStartMs: nextTimer(transition, state, nowMs),
        lastReported: reported,
      },
      phase,
      reported,
      transition,
    };
  }

  const reported = fallbackPhaseCode(signals, thresholds, state.lastReported);
  return {
    state: { ...state, lastReported: reported },
    phase: state.phase,
    reported,
    fallback: {
      phase: state.phase,
      lastReported: state.lastReported,
      reported,
      signals,
      predicates: {
        onGround: signals.onGround,
        engineRunning: signals.engineRunning,
        stationary: signals.groundSpeedKt < thresholds.stationaryGsKt,
        moving: signals.groundSpeedKt >= thresholds.movingGsKt,
        lowAgl: signals.altitudeAglFt < 1,
        lowRadioAltitude: signals.radioAltitudeFt < thresholds.lowRadioAltFt,
      },
    },
  };
}

/**
 * Stateful wrapper for a single flight. Each instance owns its own state, so
 * several machines can run side by side.
 */
export class FlightPhaseMachine {
  private state: PhaseMachineState;

  private readonly options: ResolvedOptions;

  constructor(initialPhase: FlightPhase = 'BOARDING', options: PhaseMachineOptions = {}) {
    this.options = resolveOptions(options);
    this.state = createInitialState(initialPhase);
  }

  step(snapshot: SignalSnapshot, nowMs: number): PhaseStepResult {
    const result = stepFlightPhase(snapshot, this.state, nowMs, this.options);
    this.state = result.state;
    return result;
  }

  getState(): PhaseMachineState {
    return this.state;
  }

  getThresholds(): PhaseThresholds {
    return this.options.thresholds;
  }

  /** Start over for the next flight; ARRIVED never resets on its own. */
  reset(phase: FlightPhase = 'BOARDING'): void {
    this.state = createInitialState(phase);
  }
}
