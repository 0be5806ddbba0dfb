import winston from 'winston';
import fs from 'fs';

// Console always; files under logs/ only when LOG_TO_FILES=true
const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.simple(),
    ),
  }),
];

const LOG_TO_FILES = process.env.LOG_TO_FILES === 'true';
if (LOG_TO_FILES) {
  if (!fs.existsSync('logs')) {
    fs.mkdirSync('logs');
  }
  transports.push(
    new winston.transports.File({
      filename: 'logs/bridge-error.log',
      level: 'error',
    }),
    new winston.transports.File({
      filename: 'logs/bridge.log',
    }),
  );
}

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: { service: 'sim-telemetry-bridge' },
  transports,
});

export default logger;
