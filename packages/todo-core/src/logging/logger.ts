/**
 * Pino Logger Factory
 *
 * Structured logging behind the ILogger interface every component takes.
 */

import { pino, type DestinationStream, type Logger, type LoggerOptions } from 'pino';
import type { ILogger, LogLevel } from '@taskloop/todo-contracts';

export interface LoggerConfig {
  level?: LogLevel;
  /** Pretty-print via pino-pretty; the caller must have it installed */
  pretty?: boolean;
  base?: Record<string, unknown>;
  /** Custom destination, mainly for tests */
  destination?: DestinationStream;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: 'info',
  pretty: false,
  base: { service: 'taskloop' },
};

export function createPinoLogger(config?: LoggerConfig): Logger {
  const merged = { ...DEFAULT_CONFIG, ...config };

  const options: LoggerOptions = {
    level: merged.level,
    base: merged.base,
  };

  if (merged.pretty && !merged.destination) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname,service',
      },
    };
  }

  return merged.destination ? pino(options, merged.destination) : pino(options);
}

export function createLogger(config?: LoggerConfig & { module?: string }): ILogger {
  const base = createPinoLogger(config);
  return wrapLogger(config?.module ? base.child({ module: config.module }) : base);
}

export function wrapLogger(logger: Logger): ILogger {
  return {
    debug: (msg, data) => (data ? logger.debug(data, msg) : logger.debug(msg)),
    info: (msg, data) => (data ? logger.info(data, msg) : logger.info(msg)),
    warn: (msg, data) => (data ? logger.warn(data, msg) : logger.warn(msg)),
    error: (msg, err) => {
      if (err instanceof Error) {
        logger.error({ err }, msg);
      } else if (err) {
        logger.error(err, msg);
      } else {
        logger.error(msg);
      }
    },
  };
}
