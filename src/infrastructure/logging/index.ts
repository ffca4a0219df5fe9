/**
 * @module sinew-di/infrastructure/logging
 */

export { LogLevel, consoleLogger, createConsoleLogger, silentLogger } from './consoleLogger';
export type { ConsoleLoggerOptions } from './consoleLogger';
