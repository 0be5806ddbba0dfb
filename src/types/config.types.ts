/**
 * Configuration type definitions
 */

import type { EncoderPreference } from '../encoders/PayloadEncoder';

export interface BridgeTransportConfig {
  host: string;
  port: number;
  sendIntervalMs: number;
}

export interface PhaseDwellConfig {
  taxiStartMs: number;
  fullStopMs: number;
}

export interface SignalConfig {
  fuelTankCount: number;
}

export interface ReceiverConfig {
  host: string;
  port: number;
  maxLogLines: number;
}

export interface SimulationConfig {
  tickMs: number;
  timeScale: number;
}

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  bridge: BridgeTransportConfig;
  dwell: PhaseDwellConfig;
  signals: SignalConfig;
  encoder: EncoderPreference;
  receiver: ReceiverConfig;
  simulation: SimulationConfig;
}
