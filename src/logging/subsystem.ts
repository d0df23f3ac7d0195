/**
 * Subsystem Logging
 *
 * Structured loggers scoped to a named subsystem (e.g. `fan/controller`).
 * Every subsystem logger is a tslog sub-logger of one root logger, resolved
 * on each call so that `configureLogging` takes effect for loggers created
 * at module load time.
 */

import { Logger, type ILogObj } from 'tslog';

export const LOG_LEVELS = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
} as const;

export type LogLevelName = keyof typeof LOG_LEVELS;
export type LogFormat = 'pretty' | 'json' | 'hidden';
export type LogMeta = Record<string, unknown>;

export interface LoggingOptions {
  level?: LogLevelName;
  format?: LogFormat;
}

export interface SubsystemLogger {
  readonly subsystem: string;
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  fatal(message: string, meta?: LogMeta): void;
}

const ROOT_LOGGER_NAME = 'fan-curve';

export function isLogLevelName(value: string): value is LogLevelName {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

function levelFromEnvironment(): LogLevelName {
  const raw = process.env.FAN_CURVE_LOG_LEVEL?.trim().toLowerCase();
  return raw && isLogLevelName(raw) ? raw : 'info';
}

let activeOptions: Required<LoggingOptions> = {
  level: levelFromEnvironment(),
  format: 'pretty',
};

let rootLogger: Logger<ILogObj> | undefined;
const subLoggers = new Map<string, Logger<ILogObj>>();

function getRootLogger(): Logger<ILogObj> {
  if (!rootLogger) {
    rootLogger = new Logger<ILogObj>({
      name: ROOT_LOGGER_NAME,
      type: activeOptions.format,
      minLevel: LOG_LEVELS[activeOptions.level],
    });
  }
  return rootLogger;
}

function resolveSubLogger(subsystem: string): Logger<ILogObj> {
  let logger = subLoggers.get(subsystem);
  if (!logger) {
    logger = getRootLogger().getSubLogger({ name: subsystem });
    subLoggers.set(subsystem, logger);
  }
  return logger;
}

/**
 * Reconfigures level and output format for every subsystem logger.
 */
export function configureLogging(options: LoggingOptions): void {
  activeOptions = { ...activeOptions, ...options };
  rootLogger = undefined;
  subLoggers.clear();
}

export function getLoggingOptions(): Required<LoggingOptions> {
  return { ...activeOptions };
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  const emit = (level: Exclude<LogLevelName, 'silly' | 'trace'>, message: string, meta?: LogMeta): void => {
    const logger = resolveSubLogger(subsystem);
    if (meta === undefined) {
      logger[level](message);
    } else {
      logger[level](message, meta);
    }
  };

  return {
    subsystem,
    debug: (message, meta) => emit('debug', message, meta),
    info: (message, meta) => emit('info', message, meta),
    warn: (message, meta) => emit('warn', message, meta),
    error: (message, meta) => emit('error', message, meta),
    fatal: (message, meta) => emit('fatal', message, meta),
  };
}
