import { ConsoleLogger, createLogger, isLogLevel, resolveLogLevel } from './logger';

describe('Logger', () => {
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('ConsoleLogger', () => {
    it('[EARS-1] WHEN a message is logged, THE SYSTEM SHALL prefix it', () => {
      const logger = new ConsoleLogger('[Test] ', 'debug');

      logger.info('ready', { id: 1 });

      expect(logSpy).toHaveBeenCalledWith('[Test] ready', { id: 1 });
    });

    it('[EARS-2] WHEN the level is warn, THE SYSTEM SHALL drop debug and info messages', () => {
      const logger = new ConsoleLogger('', 'warn');

      logger.debug('hidden');
      logger.info('hidden');
      logger.warn('shown');
      logger.error('shown too');

      expect(logSpy).not.toHaveBeenCalled();
      expect(warnSpy).toHaveBeenCalledWith('shown');
      expect(errorSpy).toHaveBeenCalledWith('shown too');
    });

    it('[EARS-3] WHEN the level is silent, THE SYSTEM SHALL drop every message', () => {
      const logger = new ConsoleLogger('', 'silent');

      logger.error('hidden');

      expect(errorSpy).not.toHaveBeenCalled();
    });

    it('[EARS-4] WHEN the level changes, THE SYSTEM SHALL apply it to later messages', () => {
      const logger = new ConsoleLogger('', 'error');

      logger.setLevel('debug');
      logger.debug('now visible');

      expect(logger.getLevel()).toBe('debug');
      expect(logSpy).toHaveBeenCalledWith('now visible');
    });
  });

  describe('resolveLogLevel', () => {
    it('[EARS-5] WHEN running under NODE_ENV=test, THE SYSTEM SHALL default to silent', () => {
      expect(resolveLogLevel({ NODE_ENV: 'test', LOG_LEVEL: 'debug' })).toBe('silent');
    });

    it('[EARS-6] WHEN LOG_LEVEL names a level, THE SYSTEM SHALL use it', () => {
      expect(resolveLogLevel({ LOG_LEVEL: 'warn' })).toBe('warn');
    });

    it('[EARS-7] WHEN LOG_LEVEL is unknown or unset, THE SYSTEM SHALL default to info', () => {
      expect(resolveLogLevel({ LOG_LEVEL: 'verbose' })).toBe('info');
      expect(resolveLogLevel({})).toBe('info');
    });
  });

  describe('createLogger', () => {
    it('[EARS-8] WHEN no level is given, THE SYSTEM SHALL resolve it from the environment', () => {
      expect(createLogger('[Test] ').getLevel()).toBe('silent');
      expect(createLogger('[Test] ', 'error').getLevel()).toBe('error');
    });

    it('[EARS-9] should recognize only known level names', () => {
      expect(isLogLevel('debug')).toBe(true);
      expect(isLogLevel('trace')).toBe(false);
      expect(isLogLevel(3)).toBe(false);
    });
  });
});
