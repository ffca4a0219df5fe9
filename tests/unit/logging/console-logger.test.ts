/**
 * @fileoverview Unit tests for the console loggers
 */

import { LogLevel, consoleLogger, createConsoleLogger, silentLogger } from '../../../src';

describe('Console Loggers', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should tag messages with their level', () => {
    const info = jest.spyOn(console, 'info').mockImplementation(() => undefined);
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const cause = new Error('boom');

    consoleLogger.info('started');
    consoleLogger.error('failed', cause);

    expect(info).toHaveBeenCalledWith('[INFO] started');
    expect(error).toHaveBeenCalledWith('[ERROR] failed', cause);
  });

  it('should drop messages below the configured level', () => {
    const debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = createConsoleLogger({ level: LogLevel.Warn });

    logger.debug('hidden');
    logger.warn('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[WARN] shown');
  });

  it('should prefix messages', () => {
    const info = jest.spyOn(console, 'info').mockImplementation(() => undefined);
    const logger = createConsoleLogger({ prefix: 'orders' });

    logger.info('verified');

    expect(info).toHaveBeenCalledWith('[INFO] [orders] verified');
  });

  it('should default to the info level', () => {
    const debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);

    createConsoleLogger().debug('hidden');

    expect(debug).not.toHaveBeenCalled();
  });

  it('should write nothing when silent', () => {
    const spies = (['debug', 'info', 'warn', 'error'] as const).map((method) =>
      jest.spyOn(console, method).mockImplementation(() => undefined),
    );

    silentLogger.info('quiet');
    silentLogger.error('quiet');
    createConsoleLogger({ level: LogLevel.Silent }).error('quiet');

    spies.forEach((spy) => expect(spy).not.toHaveBeenCalled());
  });
});
