/**
 * @fileoverview Console Loggers
 *
 * @module sinew-di/infrastructure/logging
 *
 * The container writes to an {@link ILogger}. These implementations cover
 * the common cases; anything with the same four methods can be passed
 * instead.
 */

import type { ILogger } from '../../application/logging';

export enum LogLevel {
  Debug = 0,
  Info = 1,
  Warn = 2,
  Error = 3,
  Silent = 4,
}

export interface ConsoleLoggerOptions {
  /** Messages below this level are dropped. Default: `LogLevel.Info` */
  level?: LogLevel;

  /** Prepended to every message, e.g. the container name */
  prefix?: string;
}

/**
 * Default console logger
 */
export const consoleLogger: ILogger = {
  debug: (message, ...args) => console.debug(`[DEBUG] ${message}`, ...args),
  info: (message, ...args) => console.info(`[INFO] ${message}`, ...args),
  warn: (message, ...args) => console.warn(`[WARN] ${message}`, ...args),
  error: (message, ...args) => console.error(`[ERROR] ${message}`, ...args),
};

/**
 * Console logger that filters by level.
 *
 * @example
 * ```typescript
 * const container = new Container({
 *   logger: createConsoleLogger({ level: LogLevel.Debug, prefix: 'orders' }),
 * });
 * // [DEBUG] [orders] Registration table locked with ...
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): ILogger {
  const minimum = options.level ?? LogLevel.Info;
  const prefix = options.prefix ? `[${options.prefix}] ` : '';

  const write =
    (level: LogLevel, target: ILogger['info']): ILogger['info'] =>
    (message, ...args) => {
      if (level >= minimum) {
        target(`${prefix}${message}`, ...args);
      }
    };

  return {
    debug: write(LogLevel.Debug, consoleLogger.debug),
    info: write(LogLevel.Info, consoleLogger.info),
    warn: write(LogLevel.Warn, consoleLogger.warn),
    error: write(LogLevel.Error, consoleLogger.error),
  };
}

/**
 * Logger that discards everything.
 */
export const silentLogger: ILogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
