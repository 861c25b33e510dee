export enum LogLevel {
  DEBUG,
  INFO,
  WARN,
  ERROR,
}

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
};

const LOG_LEVELS_BY_NAME = new Map<string, LogLevel>([
  ['DEBUG', LogLevel.DEBUG],
  ['INFO', LogLevel.INFO],
  ['WARN', LogLevel.WARN],
  ['ERROR', LogLevel.ERROR],
]);

/** Parse a level name such as "warn" or "DEBUG"; unknown names give undefined */
export function parseLogLevel(name: string): LogLevel | undefined {
  return LOG_LEVELS_BY_NAME.get(name.trim().toUpperCase());
}

export class Logger {
  private static instance: Logger | undefined;
  private logLevel: LogLevel = LogLevel.INFO;

  private constructor() {}

  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /** Drop the singleton so the next getInstance() starts from defaults */
  public static resetInstance(): void {
    Logger.instance = undefined;
  }

  public setLogLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  public getLogLevel(): LogLevel {
    return this.logLevel;
  }

  private log(level: LogLevel, message: string, ...args: unknown[]): void {
    if (level >= this.logLevel) {
      const timestamp = new Date().toISOString();
      const levelName = LOG_LEVEL_NAMES[level];
      console.log(`[${timestamp}] [${levelName}] ${message}`, ...args);
    }
  }

  public debug(message: string, ...args: unknown[]): void {
    this.log(LogLevel.DEBUG, message, ...args);
  }

  public info(message: string, ...args: unknown[]): void {
    this.log(LogLevel.INFO, message, ...args);
  }

  public warn(message: string, ...args: unknown[]): void {
    this.log(LogLevel.WARN, message, ...args);
  }

  public error(message: string, ...args: unknown[]): void {
    this.log(LogLevel.ERROR, message, ...args);
  }
}

export const logger = Logger.getInstance();
