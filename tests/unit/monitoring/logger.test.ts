import { createLogger, getLogger, isLogLevel, Logger, LOG_LEVELS } from '../../../src/monitoring/logger';

describe('Logger', () => {
  let logger: Logger;

  beforeEach(() => {
    // getLogger returns a singleton; set the level explicitly where it matters
    logger = getLogger();
    logger.setLogLevel('DEBUG');
  });

  afterAll(() => {
    getLogger().setLogLevel('INFO');
  });

  describe('Structured logging', () => {
    it('should create a logger instance', () => {
      expect(logger).toBeInstanceOf(Logger);
    });

    it('should log at every level with structured data', () => {
      expect(() => {
        logger.debug('Workflow node entered', { sessionId: 'session-1', event: 'workflow_node_entered', node: 'classify' });
        logger.info('Route decided', { sessionId: 'session-1', event: 'route_decided', route: 'EXECUTE' });
        logger.warn('Classification failed');
      }).not.toThrow();
    });

    it('should log errors with and without data', () => {
      expect(() => {
        logger.error('Tool retries exhausted', new Error('upstream 502'));
        logger.error('Invocation failed', { sessionId: 'session-1', event: 'invocation_failed' }, new Error('boom'));
      }).not.toThrow();
    });
  });

  describe('Log levels', () => {
    it.each(LOG_LEVELS)('should support the %s level', (level) => {
      logger.setLogLevel(level);

      expect(logger.getLogLevel()).toBe(level);
    });

    it('should validate level names', () => {
      expect(isLogLevel('WARN')).toBe(true);
      expect(isLogLevel('warn')).toBe(false);
      expect(isLogLevel(undefined)).toBe(false);
    });
  });

  describe('Singleton', () => {
    it('should hand out one shared instance', () => {
      expect(createLogger()).toBe(getLogger());
    });

    it('should apply a level passed to createLogger', () => {
      const shared = createLogger('WARN');

      expect(shared).toBe(logger);
      expect(logger.getLogLevel()).toBe('WARN');
    });
  });

  describe('Independent instances', () => {
    it('should keep their own level', () => {
      const quiet = new Logger('ERROR');

      expect(quiet.getLogLevel()).toBe('ERROR');
      expect(getLogger().getLogLevel()).toBe('DEBUG');
    });
  });
});
