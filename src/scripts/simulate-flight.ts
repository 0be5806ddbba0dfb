#!/usr/bin/env node
/**
 * Fly the built-in nominal profile through a bridge and send the telemetry to
 * BRIDGE_HOST:BRIDGE_PORT. This script plays the host simulator: it owns the
 * tick timer and advances simulated time SIMULATION_TIME_SCALE times faster
 * than the wall clock.
 */

import config from '../config';
import logger from '../utils/logger';
import { createTelemetryBridge } from '../services/createTelemetryBridge';
import { FlightProfileSource, NOMINAL_FLIGHT } from '../simulation/FlightProfileSource';

const source = new FlightProfileSource(NOMINAL_FLIGHT);
const { bridge, transport } = createTelemetryBridge(source);
const { tickMs, timeScale } = config.simulation;

const startedAt = Date.now();
let lastReported: string | null = null;
let finished = false;

logger.info('Starting simulated flight', {
  profile: NOMINAL_FLIGHT.name,
  host: config.bridge.host,
  port: config.bridge.port,
  tickMs,
  timeScale,
});

const finish = (reason: string): void => {
  if (finished) {
    return;
  }
  finished = true;
  clearInterval(timer);
  transport.close();
  logger.info('Simulated flight finished', {
    reason,
    status: bridge.getStatus(),
    transport: transport.getStats(),
  });
};

const timer = setInterval(() => {
  const simElapsedMs = (Date.now() - startedAt) * timeScale;
  source.setElapsed(simElapsedMs);

  const result = bridge.tick(startedAt + simElapsedMs);
  if (result.reported && result.reported !== lastReported) {
    lastReported = result.reported;
    logger.info('Reported status', { status: result.reported, phase: result.phase, simSeconds: Math.floor(simElapsedMs / 1000) });
  }

  if (result.phase === 'ARRIVED') {
    finish('arrived');
  } else if (simElapsedMs > source.getDurationMs() + 60000) {
    finish('profile ended before arrival');
  }
}, tickMs);

process.once('SIGINT', () => finish('interrupted'));
