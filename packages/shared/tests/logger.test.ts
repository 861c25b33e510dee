import { Logger, LogLevel, parseLogLevel } from '../src/logger';

describe('Logger', () => {
  let logger: Logger;
  let consoleSpy: jest.SpyInstance;

  beforeEach(() => {
    // Reset singleton instance for isolation
    Logger.resetInstance();
    logger = Logger.getInstance();
    consoleSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleSpy.mockRestore();
  });

  it('should be a singleton', () => {
    const anotherLogger = Logger.getInstance();
    expect(logger).toBe(anotherLogger);
  });

  it('should log info messages by default', () => {
    logger.info('test message');
    expect(consoleSpy).toHaveBeenCalledTimes(1);
    expect(consoleSpy.mock.calls[0][0]).toMatch(/^\[.+\] \[INFO\] test message$/);
  });

  it('should not log debug messages by default', () => {
    logger.debug('adjusted road 1');
    expect(consoleSpy).not.toHaveBeenCalled();
  });

  it('should not log info messages if level is WARN', () => {
    logger.setLogLevel(LogLevel.WARN);
    logger.info('test message');
    expect(consoleSpy).not.toHaveBeenCalled();
  });

  it('should log warn messages if level is WARN or lower', () => {
    logger.setLogLevel(LogLevel.WARN);
    logger.warn('test message');
    expect(consoleSpy.mock.calls[0][0]).toContain('[WARN] test message');
  });

  it('should pass extra arguments through', () => {
    logger.error('failed', 42);
    expect(consoleSpy.mock.calls[0][1]).toBe(42);
  });
});

describe('parseLogLevel', () => {
  it('should accept names in any case', () => {
    expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel(' Warn ')).toBe(LogLevel.WARN);
  });

  it('should return undefined for unknown names', () => {
    expect(parseLogLevel('verbose')).toBeUndefined();
  });
});
