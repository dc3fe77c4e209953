/**
 * Logger factory
 *
 * Logs go to stderr; stdout is left to whatever protocol front-end embeds
 * the relay.
 */
import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';

export interface LoggerConfig {
  /** pino level name. Default: info */
  level?: string;
  /** Human-readable output through pino-pretty */
  pretty?: boolean;
  name?: string;
}

export function createLogger(config: LoggerConfig = {}): Logger {
  const options: LoggerOptions = {
    name: config.name ?? 'qa-relay',
    level: config.level ?? 'info',
  };

  if (config.pretty) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          destination: 2,
        },
      },
    });
  }

  return pino(options, pino.destination(2));
}

let defaultLogger: Logger | null = null;

/**
 * Shared root logger, created on first use
 */
export function getDefaultLogger(): Logger {
  if (defaultLogger === null) {
    defaultLogger = createLogger();
  }
  return defaultLogger;
}
