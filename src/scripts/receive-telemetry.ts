#!/usr/bin/env node
/**
 * Listen for bridge datagrams on RECEIVER_HOST:RECEIVER_PORT and log each
 * status change, with a one-line summary every few seconds.
 */

import config from '../config';
import logger from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { TelemetryReceiver } from '../services/TelemetryReceiver';

const SUMMARY_INTERVAL_MS = 5000;

let lastStatus: string | null = null;

const receiver = new TelemetryReceiver({
  host: config.receiver.host,
  port: config.receiver.port,
  maxLogLines: config.receiver.maxLogLines,
  handlers: {
    onStatus: (status, distance, fuel, flightTime) => {
      if (status !== lastStatus) {
        lastStatus = status;
        logger.info('Status received', {
          status,
          distance,
          fuel,
          flightTime,
        });
      }
    },
    onEvents: (events) => {
      events.forEach((event) => logger.info('Flight event received', event));
    },
  },
});

async function main(): Promise<void> {
  await receiver.start();
  const summaryTimer = setInterval(() => logger.info(receiver.getSummary()), SUMMARY_INTERVAL_MS);

  process.once('SIGINT', () => {
    clearInterval(summaryTimer);
    receiver.stop()
      .then(() => logger.info('Receiver shut down', { packets: receiver.getSnapshot().packetsOk }))
      .catch((error: unknown) => logger.error('Receiver shutdown failed', { error: errorMessage(error) }));
  });
}

main().catch((error: unknown) => {
  logger.error('Receiver failed to start', { error: errorMessage(error) });
  process.exitCode = 1;
});
