import dotenv from 'dotenv';
import { describeConfig, resolveConfig, type Configuration } from './config/config.js';
import { bootstrapLogger, createLogger, type Logger } from './logging/logger.js';

const SHUTDOWN_TIMEOUT_MS = 10_000;

export interface LoadConfigOptions {
  /** Defaults to `process.env` after reading `.env`. */
  env?: Record<string, string | undefined>;
  createLogger?: (config: Configuration) => Logger;
  fatalLogger?: Logger;
}

function envFromDotenv(): Record<string, string | undefined> {
  dotenv.config();
  return process.env;
}

/**
 * Entry-point helper: resolve the configuration and log its summary, or
 * exit non-zero listing every configuration problem.
 */
export function loadConfigOrExit(
  options: LoadConfigOptions = {}
): { config: Configuration; logger: Logger } {
  const result = resolveConfig(options.env ?? envFromDotenv());
  if (!result.ok) {
    (options.fatalLogger ?? bootstrapLogger).fatal(
      { issues: result.error.issues },
      result.error.message
    );
    process.exit(1);
  }

  const config = result.config;
  const logger = (options.createLogger ?? createLogger)(config);
  logger.info({ config: describeConfig(config) }, 'Loaded configuration');
  return { config, logger };
}

/**
 * Where shutdown signals come from; `process` in production.
 */
export interface SignalSource {
  on(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface ShutdownOptions {
  signals?: SignalSource;
  exit?: (code: number) => void;
  timeoutMs?: number;
}

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

/**
 * On SIGTERM/SIGINT run `cleanup` once, then exit 0, or 1 if it fails.
 * A cleanup still running after the timeout is cut short with exit code 1.
 * Returns a function that removes the signal listeners.
 */
export function handleShutdown(
  logger: Logger,
  cleanup: () => Promise<void>,
  options: ShutdownOptions = {}
): () => void {
  const signals: SignalSource = options.signals ?? process;
  const exit = options.exit ?? ((code: number) => process.exit(code));
  const timeoutMs = options.timeoutMs ?? SHUTDOWN_TIMEOUT_MS;
  let stopping = false;

  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info({ signal }, 'Shutting down');

    setTimeout(() => {
      logger.error('Shutdown timed out, forcing exit');
      exit(1);
    }, timeoutMs).unref();

    void cleanup().then(
      () => exit(0),
      (err: unknown) => {
        logger.error({ err }, 'Shutdown failed');
        exit(1);
      }
    );
  };

  for (const signal of SHUTDOWN_SIGNALS) {
    signals.on(signal, shutdown);
  }
  return () => {
    for (const signal of SHUTDOWN_SIGNALS) {
      signals.off(signal, shutdown);
    }
  };
}
