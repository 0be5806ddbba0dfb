import type { SignalName, SignalSource } from '../signals/SignalSource';
import type { SignalValues } from '../signals/StaticSignalSource';
import { flightProfileSchema, type FlightProfile } from '../schemas/profile.schemas';
import nominalFlight from './nominalFlight.json';

// Discrete signals hold the earlier keyframe's value instead of interpolating
const STEPPED_SIGNALS: ReadonlySet<SignalName> = new Set<SignalName>(['onGround', 'engineRunning', 'paused']);

interface ResolvedKeyframe {
  atMs: number;
  values: SignalValues;
}

export const loadFlightProfile = (raw: unknown): FlightProfile => flightProfileSchema.parse(raw);

export const NOMINAL_FLIGHT: FlightProfile = loadFlightProfile(nominalFlight);

const lerp = (from: number, to: number, ratio: number): number => from + (to - from) * ratio;

const valueAt = (value: number | readonly number[] | undefined, index: number): number | undefined => {
  if (value === undefined || typeof value === 'number') {
    return index === 0 ? value : undefined;
  }
  return value[index];
};

/**
 * Signal source that plays back a keyframed flight. Each keyframe only lists
 * what changed; earlier values carry forward. Continuous signals are
 * interpolated linearly between keyframes.
 */
export class FlightProfileSource implements SignalSource {
  private readonly keyframes: ResolvedKeyframe[];

  private elapsedMs = 0;

  constructor(profile: FlightProfile) {
    let carried: SignalValues = {};
    this.keyframes = profile.keyframes.map((frame) => {
      carried = { ...carried, ...frame.values };
      return { atMs: frame.atSec * 1000, values: carried };
    });
  }

  setElapsed(elapsedMs: number): void {
    this.elapsedMs = Math.max(0, elapsedMs);
  }

  getElapsed(): number {
    return this.elapsedMs;
  }

  /** Time of the last keyframe. */
  getDurationMs(): number {
    return this.keyframes[this.keyframes.length - 1].atMs;
  }

  read(signal: SignalName, index = 0): number | undefined {
    const nextIndex = this.keyframes.findIndex((frame) => frame.atMs > this.elapsedMs);
    if (nextIndex === -1) {
      return valueAt(this.keyframes[this.keyframes.length - 1].values[signal], index);
    }
    if (nextIndex === 0) {
      return valueAt(this.keyframes[0].values[signal], index);
    }

    const previous = this.keyframes[nextIndex - 1];
    const next = this.keyframes[nextIndex];
    const from = valueAt(previous.values[signal], index);
    const to = valueAt(next.values[signal], index);

    if (from === undefined || to === undefined || STEPPED_SIGNALS.has(signal)) {
      return from;
    }
    const ratio = (this.elapsedMs - previous.atMs) / (next.atMs - previous.atMs);
    return lerp(from, to, ratio);
  }
}
