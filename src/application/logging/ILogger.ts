/**
 * @module sinew-di/application/logging
 */

/**
 * Logger contract the container writes to. Any object with these four
 * methods works, including `console`.
 */
export interface ILogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}
