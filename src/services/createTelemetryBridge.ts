import config from '../config';
import { selectEncoder, type PayloadEncoder } from '../encoders';
import type { SignalSource } from '../signals/SignalSource';
import type { AppConfig } from '../types/config.types';
import type { FlightPhase } from '../types/telemetry.types';
import { DiagnosticsRecorder } from './DiagnosticsRecorder';
import { RateLimitedTransport, type DatagramSocketFactory } from './RateLimitedTransport';
import { TelemetryBridge } from './TelemetryBridge';

export interface CreateBridgeOverrides {
  initialPhase?: FlightPhase;
  encoder?: PayloadEncoder;
  socketFactory?: DatagramSocketFactory;
}

export interface BridgeRuntime {
  bridge: TelemetryBridge;
  transport: RateLimitedTransport;
  diagnostics: DiagnosticsRecorder;
}

/**
 * Wire a bridge, its transport and encoder from configuration and open the
 * socket. The caller owns the tick cadence and must `transport.close()` on shutdown.
 */
export function createTelemetryBridge(
  source: SignalSource,
  appConfig: AppConfig = config,
  overrides: CreateBridgeOverrides = {},
): BridgeRuntime {
  const diagnostics = new DiagnosticsRecorder();
  const transport = new RateLimitedTransport({
    host: appConfig.bridge.host,
    port: appConfig.bridge.port,
    sendIntervalMs: appConfig.bridge.sendIntervalMs,
    socketFactory: overrides.socketFactory,
    diagnostics,
  });
  transport.open();

  const bridge = new TelemetryBridge({
    source,
    transport,
    encoder: overrides.encoder ?? selectEncoder(appConfig.encoder),
    fuelTankCount: appConfig.signals.fuelTankCount,
    initialPhase: overrides.initialPhase,
    phase: { dwell: appConfig.dwell },
    diagnostics,
  });

  return { bridge, transport, diagnostics };
}
