import { logger, parseLogLevel } from './logger';

export interface BuilderSettings {
  /** Lane width in meters used when a lane definition carries none */
  standardLaneWidth: number;
  /** Throw on duplicate links instead of warning and keeping the first */
  strictLinks: boolean;
  /** Boundary curvature of synthesized junction clothoids */
  startClothoidCurvature: number;
  g2Tolerance: number;
  g2MaxIterations: number;
  revMajor: string;
  revMinor: string;
}

export const DEFAULT_SETTINGS: Readonly<BuilderSettings> = {
  standardLaneWidth: 3,
  strictLinks: false,
  startClothoidCurvature: 1e-9,
  g2Tolerance: 1e-10,
  g2MaxIterations: 100,
  revMajor: '1',
  revMinor: '5',
};

export class Settings {
  private static instance: Settings | undefined;
  private values: BuilderSettings = { ...DEFAULT_SETTINGS };

  private constructor() {}

  public static getInstance(): Settings {
    if (!Settings.instance) {
      Settings.instance = new Settings();
    }
    return Settings.instance;
  }

  public get(): Readonly<BuilderSettings> {
    return this.values;
  }

  public update(changes: Partial<BuilderSettings>): void {
    this.values = { ...this.values, ...changes };
  }

  public reset(): void {
    this.values = { ...DEFAULT_SETTINGS };
  }
}

export const settings = Settings.getInstance();

/**
 * Apply ROADFORGE_STRICT_LINKS, ROADFORGE_LANE_WIDTH and LOG_LEVEL.
 * Malformed values are reported and ignored.
 */
export function loadSettingsFromEnv(env: NodeJS.ProcessEnv = process.env): Readonly<BuilderSettings> {
  const changes: Partial<BuilderSettings> = {};

  if (env.ROADFORGE_STRICT_LINKS !== undefined) {
    changes.strictLinks = ['1', 'true', 'yes'].includes(env.ROADFORGE_STRICT_LINKS.toLowerCase());
  }

  if (env.ROADFORGE_LANE_WIDTH !== undefined) {
    const width = Number(env.ROADFORGE_LANE_WIDTH);
    if (Number.isFinite(width) && width > 0) {
      changes.standardLaneWidth = width;
    } else {
      logger.warn(`Ignoring ROADFORGE_LANE_WIDTH=${env.ROADFORGE_LANE_WIDTH}`);
    }
  }

  if (env.LOG_LEVEL !== undefined) {
    const level = parseLogLevel(env.LOG_LEVEL);
    if (level === undefined) {
      logger.warn(`Ignoring LOG_LEVEL=${env.LOG_LEVEL}`);
    } else {
      logger.setLogLevel(level);
    }
  }

  settings.update(changes);
  return settings.get();
}
