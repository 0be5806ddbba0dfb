import logger from '../utils/logger';
import { errorMessage } from '../utils/errors';
import type { PayloadEncoder } from '../encoders/PayloadEncoder';
import { readSnapshot, type SignalSource } from '../signals/SignalSource';
import type {
  FlightPhase,
  PhaseMachineState,
  TelemetryPayload,
  WireCode,
} from '../types/telemetry.types';
import { DiagnosticsRecorder } from './DiagnosticsRecorder';
import {
  FlightPhaseMachine,
  type PhaseFallbackDiagnostic,
  type PhaseMachineOptions,
} from './FlightPhaseMachine';
import type { TelemetryTransport } from './RateLimitedTransport';
import { buildTelemetryPayload } from './TelemetryPayloadBuilder';

export interface TelemetryBridgeOptions {
  source: SignalSource;
  transport: TelemetryTransport;
  encoder: PayloadEncoder;
  fuelTankCount?: number;
  initialPhase?: FlightPhase;
  phase?: PhaseMachineOptions;
  diagnostics?: DiagnosticsRecorder;
}

export interface TickResult {
  phase: FlightPhase;
  /** Null when the tick failed before a code was derived. */
  reported: WireCode | null;
  sent: boolean;
  payload?: TelemetryPayload;
}

export interface BridgeStatus {
  phase: FlightPhase;
  lastReported: WireCode;
  encoder: string;
  ticks: number;
  failedTicks: number;
  fallbackTicks: number;
  encodeErrors: number;
  sends: number;
}

const DEFAULT_FUEL_TANKS = 4;

/**
 * Per-tick pipeline: read signals, step the phase machine, and when the
 * transport is due build, encode and send the payload.
 *
 * The host calls `tick` on its own cadence; the bridge owns no timers and
 * `tick` never throws.
 */
export class TelemetryBridge {
  private readonly machine: FlightPhaseMachine;

  private readonly diagnostics: DiagnosticsRecorder;

  private readonly fuelTankCount: number;

  private inFallback = false;

  private counters = {
    ticks: 0,
    failedTicks: 0,
    fallbackTicks: 0,
    encodeErrors: 0,
    sends: 0,
  };

  constructor(private readonly options: TelemetryBridgeOptions) {
    this.machine = new FlightPhaseMachine(options.initialPhase, options.phase);
    this.diagnostics = options.diagnostics ?? new DiagnosticsRecorder();
    this.fuelTankCount = options.fuelTankCount ?? DEFAULT_FUEL_TANKS;
  }

  tick(nowMs: number = Date.now()): TickResult {
    this.counters.ticks += 1;

    try {
      const snapshot = readSnapshot(this.options.source, { fuelTankCount: this.fuelTankCount });
      const previousPhase = this.machine.getState().phase;
      const step = this.machine.step(snapshot, nowMs);

      if (step.fallback) {
        this.recordFallback(step.fallback, nowMs);
      } else {
        this.inFallback = false;
      }

      if (step.phase !== previousPhase) {
        logger.info('Flight phase changed', {
          from: previousPhase,
          to: step.phase,
          reported: step.reported,
        });
      }

      if (!this.options.transport.isDue(nowMs)) {
        return { phase: step.phase, reported: step.reported, sent: false };
      }

      const payload = buildTelemetryPayload(snapshot, step.reported, new Date(nowMs));
      const bytes = this.encode(payload, nowMs);
      if (!bytes) {
        return { phase: step.phase, reported: step.reported, sent: false, payload };
      }

      const sent = this.options.transport.maybeSend(bytes, nowMs);
      if (sent) {
        this.counters.sends += 1;
      }
      return {
        phase: step.phase,
        reported: step.reported,
        sent,
        payload,
      };
    } catch (error) {
      this.counters.failedTicks += 1;
      logger.error('Telemetry tick failed', {
        error: errorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      return { phase: this.machine.getState().phase, reported: null, sent: false };
    }
  }

  /** Begin a new flight. */
  reset(phase: FlightPhase = 'BOARDING'): void {
    logger.info('Flight phase machine reset', { from: this.machine.getState().phase, to: phase });
    this.machine.reset(phase);
    this.inFallback = false;
  }

  getState(): PhaseMachineState {
    return this.machine.getState();
  }

  getDiagnostics(): DiagnosticsRecorder {
    return this.diagnostics;
  }

  getStatus(): BridgeStatus {
    const state = this.machine.getState();
    return {
      phase: state.phase,
      lastReported: state.lastReported,
      encoder: this.options.encoder.name,
      ...this.counters,
    };
  }

  private encode(payload: TelemetryPayload, nowMs: number): Buffer | null {
    try {
      return this.options.encoder.encode(payload);
    } catch (error) {
      this.counters.encodeErrors += 1;
      const details = {
        encoder: this.options.encoder.name,
        status: payload.status,
        error: errorMessage(error),
      };
      this.diagnostics.record('encode_error', details, nowMs);
      logger.error('Telemetry payload encode failed', details);
      return null;
    }
  }

  private recordFallback(diagnostic: PhaseFallbackDiagnostic, nowMs: number): void {
    this.counters.fallbackTicks += 1;
    const details = { ...diagnostic };
    this.diagnostics.record('phase_fallback', details, nowMs);

    // One warning per inconsistent stretch; the rest go to debug
    if (!this.inFallback) {
      this.inFallback = true;
      logger.warn('Flight phase fallback', details);
    } else {
      logger.debug('Flight phase fallback', details);
    }
  }
}
