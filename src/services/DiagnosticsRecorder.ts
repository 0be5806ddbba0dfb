export type DiagnosticKind = 'phase_fallback' | 'transport_error' | 'encode_error';

export interface DiagnosticEvent {
  kind: DiagnosticKind;
  at: number;
  details: Record<string, unknown>;
}

/**
 * Bounded in-memory record of structured diagnostic events.
 * Counts keep growing after old events are dropped from the buffer.
 */
export class DiagnosticsRecorder {
  private events: DiagnosticEvent[] = [];

  private counts: Map<DiagnosticKind, number> = new Map();

  constructor(private readonly maxEvents: number = 500) {}

  record(kind: DiagnosticKind, details: Record<string, unknown>, at: number = Date.now()): DiagnosticEvent {
    const event: DiagnosticEvent = { kind, at, details };
    this.events.push(event);
    if (this.events.length > this.maxEvents) {
      this.events = this.events.slice(-this.maxEvents);
    }
    this.counts.set(kind, this.count(kind) + 1);
    return event;
  }

  list(kind?: DiagnosticKind): DiagnosticEvent[] {
    return kind ? this.events.filter((event) => event.kind === kind) : [...this.events];
  }

  count(kind: DiagnosticKind): number {
    return this.counts.get(kind) ?? 0;
  }

  clear(): void {
    this.events = [];
    this.counts.clear();
  }
}
