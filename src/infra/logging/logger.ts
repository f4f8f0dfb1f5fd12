import pino from 'pino';
import type { Configuration } from '../config/config.js';

export type Logger = pino.Logger;

/**
 * Root logger for the process.
 * Outside production, logs go through pino-pretty; in production they stay raw JSON.
 */
export function createLogger(config: Pick<Configuration, 'serviceName' | 'logLevel'>): Logger {
  return pino({
    name: config.serviceName,
    level: config.logLevel,
    timestamp: pino.stdTimeFunctions.isoTime,
    transport:
      process.env.NODE_ENV !== 'production'
        ? { target: 'pino-pretty' }
        : undefined,
  });
}

/**
 * Logger used before configuration exists, and for fatal startup errors.
 */
export const bootstrapLogger: Logger = pino({
  name: 'bootstrap',
  timestamp: pino.stdTimeFunctions.isoTime,
});

/**
 * Logger that discards everything, for tests.
 */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
