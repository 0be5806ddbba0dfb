import type { SignalName, SignalSource } from './SignalSource';

export type SignalValues = Partial<Record<SignalName, number | readonly number[]>>;

/**
 * In-memory signal source. Array values serve indexed signals such as the
 * per-tank fuel quantity.
 */
export class StaticSignalSource implements SignalSource {
  private values: SignalValues;

  constructor(values: SignalValues = {}) {
    this.values = { ...values };
  }

  set(values: SignalValues): void {
    this.values = { ...this.values, ...values };
  }

  replace(values: SignalValues): void {
    this.values = { ...values };
  }

  read(signal: SignalName, index = 0): number | undefined {
    const value = this.values[signal];
    if (value === undefined || typeof value === 'number') {
      return index === 0 ? value : undefined;
    }
    return value[index];
  }
}
