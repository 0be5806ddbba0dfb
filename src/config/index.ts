import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import type { AppConfig } from '../types/config.types';
import type { EncoderPreference } from '../encoders/PayloadEncoder';
import { ConfigError } from '../utils/errors';

const rootEnvPath = path.resolve(__dirname, '../../.env');
if (fs.existsSync(rootEnvPath)) {
  dotenv.config({ path: rootEnvPath });
}

dotenv.config();

const resolveEnv = (value: string | undefined): AppConfig['env'] => {
  if (value === 'production' || value === 'test') {
    return value;
  }
  return 'development';
};

const parseNumber = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const parseSeconds = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }
  const parsed = parseFloat(value);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
};

const parsePort = (name: string, value: string | undefined, fallback: number): number => {
  const port = parseNumber(value, fallback);
  if (port < 1 || port > 65535) {
    throw new ConfigError(`${name} must be between 1 and 65535 (got ${port})`);
  }
  return port;
};

const ENCODER_PREFERENCES: readonly EncoderPreference[] = ['auto', 'schema', 'minimal'];

const parseEncoder = (value: string | undefined): EncoderPreference => {
  const normalized = (value || 'auto').trim().toLowerCase();
  const match = ENCODER_PREFERENCES.find((preference) => preference === normalized);
  if (!match) {
    throw new ConfigError(`BRIDGE_ENCODER must be one of ${ENCODER_PREFERENCES.join(', ')} (got ${value})`);
  }
  return match;
};

// Must match the port the ground-side client listens on
const DEFAULT_PORT = 47777;

/**
 * Centralized configuration management
 * All environment variables and config should live here
 */
const config: AppConfig = {
  env: resolveEnv(process.env.NODE_ENV),
  bridge: {
    host: process.env.BRIDGE_HOST || '127.0.0.1',
    port: parsePort('BRIDGE_PORT', process.env.BRIDGE_PORT, DEFAULT_PORT),
    sendIntervalMs: Math.round(parseSeconds(process.env.BRIDGE_SEND_INTERVAL_SECONDS, 0.5) * 1000),
  },
  dwell: {
    taxiStartMs: Math.round(parseSeconds(process.env.TAXI_START_DWELL_SECONDS, 5) * 1000),
    fullStopMs: Math.round(parseSeconds(process.env.FULL_STOP_DWELL_SECONDS, 10) * 1000),
  },
  signals: {
    fuelTankCount: Math.max(1, parseNumber(process.env.FUEL_TANK_COUNT, 4)),
  },
  encoder: parseEncoder(process.env.BRIDGE_ENCODER),
  receiver: {
    host: process.env.RECEIVER_HOST || '0.0.0.0',
    port: parsePort('RECEIVER_PORT', process.env.RECEIVER_PORT, DEFAULT_PORT),
    maxLogLines: Math.max(10, parseNumber(process.env.RECEIVER_MAX_LOG_LINES, 500)),
  },
  simulation: {
    tickMs: Math.max(10, parseNumber(process.env.SIMULATION_TICK_MS, 100)),
    timeScale: Math.max(1, parseNumber(process.env.SIMULATION_TIME_SCALE, 10)),
  },
};

export default config;
