import { DEFAULT_SETTINGS, loadSettingsFromEnv, settings } from '../src/config';
import { logger, LogLevel } from '../src/logger';

describe('settings', () => {
  let consoleSpy: jest.SpyInstance;

  beforeEach(() => {
    consoleSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    settings.reset();
    logger.setLogLevel(LogLevel.INFO);
    consoleSpy.mockRestore();
  });

  it('should start from the defaults', () => {
    expect(settings.get()).toEqual(DEFAULT_SETTINGS);
  });

  it('should update and reset', () => {
    settings.update({ standardLaneWidth: 3.5 });
    expect(settings.get().standardLaneWidth).toBe(3.5);
    expect(settings.get().strictLinks).toBe(false);
    settings.reset();
    expect(settings.get().standardLaneWidth).toBe(3);
  });

  it('should read settings from the environment', () => {
    const loaded = loadSettingsFromEnv({ ROADFORGE_STRICT_LINKS: 'TRUE', ROADFORGE_LANE_WIDTH: '3.25', LOG_LEVEL: 'debug' });
    expect(loaded.strictLinks).toBe(true);
    expect(loaded.standardLaneWidth).toBe(3.25);
    expect(logger.getLogLevel()).toBe(LogLevel.DEBUG);
  });

  it('should ignore malformed values with a warning', () => {
    const loaded = loadSettingsFromEnv({ ROADFORGE_LANE_WIDTH: 'wide', LOG_LEVEL: 'loud' });
    expect(loaded.standardLaneWidth).toBe(3);
    expect(logger.getLogLevel()).toBe(LogLevel.INFO);
    expect(consoleSpy).toHaveBeenCalledTimes(2);
    expect(consoleSpy.mock.calls[0][0]).toMatch(/\[WARN\] Ignoring ROADFORGE_LANE_WIDTH=wide$/);
  });

  it('should treat other flag values as false', () => {
    settings.update({ strictLinks: true });
    expect(loadSettingsFromEnv({ ROADFORGE_STRICT_LINKS: 'no' }).strictLinks).toBe(false);
  });
});
