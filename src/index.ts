export { default as config } from './config';
export { default as logger } from './utils/logger';
export * from './utils/errors';
export * from './utils/units';
export * from './types/telemetry.types';
export type { AppConfig } from './types/config.types';

export { readSnapshot, type SignalName, type SignalSource } from './signals/SignalSource';
export { StaticSignalSource, type SignalValues } from './signals/StaticSignalSource';
export { DatarefSignalSource, XPLANE_DATAREFS, type DatarefReader } from './signals/datarefs';

export * from './encoders';
export * from './schemas/telemetry.schemas';

export {
  FlightPhaseMachine,
  createInitialState,
  fallbackPhaseCode,
  stepFlightPhase,
  toRuleSignals,
  type PhaseFallbackDiagnostic,
  type PhaseMachineOptions,
  type PhaseStepResult,
} from './services/FlightPhaseMachine';
export * from './services/phaseTransitions';
export { buildTelemetryPayload, formatSimTime } from './services/TelemetryPayloadBuilder';
export * from './services/RateLimitedTransport';
export * from './services/DiagnosticsRecorder';
export * from './services/TelemetryBridge';
export * from './services/TelemetryReceiver';
export * from './services/createTelemetryBridge';

export { FlightProfileSource, NOMINAL_FLIGHT, loadFlightProfile } from './simulation/FlightProfileSource';
export type { FlightProfile } from './schemas/profile.schemas';
