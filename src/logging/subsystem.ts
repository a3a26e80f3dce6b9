/**
 * Subsystem Logging
 *
 * Thin wrapper over a shared tslog root logger. Every component asks for a
 * named child logger (e.g. `sysmon/scheduler`) and logs `(message, meta?)`.
 */

import { Logger, type ILogObj } from 'tslog';

export type LogLevelName = 'silly' | 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const LOG_LEVELS: Record<LogLevelName, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

export interface SubsystemLogger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  fatal(message: string, meta?: Record<string, unknown>): void;
}

export function isLogLevelName(value: string): value is LogLevelName {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Resolves the minimum numeric tslog level from `SYSMON_LOG_LEVEL`,
 * falling back to `info` for unset or unknown values.
 */
export function resolveMinLevel(raw: string | undefined = process.env.SYSMON_LOG_LEVEL): number {
  const name = raw?.trim().toLowerCase();
  if (name && isLogLevelName(name)) {
    return LOG_LEVELS[name];
  }
  return LOG_LEVELS.info;
}

const rootLogger = new Logger<ILogObj>({
  name: 'serial-sysmon',
  type: 'pretty',
  minLevel: resolveMinLevel(),
  prettyLogTimeZone: 'local',
});

const subLoggers = new Set<Logger<ILogObj>>();

/**
 * Changes the minimum level of the root logger and every subsystem logger
 * created so far. Sub-loggers copy their settings when created.
 */
export function setLogLevel(level: LogLevelName): void {
  rootLogger.settings.minLevel = LOG_LEVELS[level];
  for (const logger of subLoggers) {
    logger.settings.minLevel = LOG_LEVELS[level];
  }
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  const logger = rootLogger.getSubLogger({ name: subsystem });
  subLoggers.add(logger);

  const write = (
    fn: (...args: unknown[]) => unknown,
    message: string,
    meta?: Record<string, unknown>,
  ): void => {
    if (meta && Object.keys(meta).length > 0) {
      fn(message, meta);
    } else {
      fn(message);
    }
  };

  return {
    debug: (message, meta) => write(logger.debug.bind(logger), message, meta),
    info: (message, meta) => write(logger.info.bind(logger), message, meta),
    warn: (message, meta) => write(logger.warn.bind(logger), message, meta),
    error: (message, meta) => write(logger.error.bind(logger), message, meta),
    fatal: (message, meta) => write(logger.fatal.bind(logger), message, meta),
  };
}
