/**
 * Log levels for the agent
 */
enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

const levelMap: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

export function isLogLevelName(value: string): value is LogLevelName {
  return Object.hasOwn(levelMap, value);
}

function parseLevel(value: string | undefined): LogLevel | undefined {
  const name = value?.toLowerCase();
  return name && isLogLevelName(name) ? levelMap[name] : undefined;
}

/**
 * Operator-facing logger. Everything the agent absorbs on behalf of the host
 * application ends up here instead of in the host's call path.
 */
export class Logger {
  private static level: LogLevel = parseLevel(process.env.VIGIL_LOG_LEVEL) ?? LogLevel.INFO;

  constructor(private namespace: string) {}

  debug(message: string, ...args: unknown[]): void {
    if (Logger.level <= LogLevel.DEBUG) {
      console.debug(`[vigil:${this.namespace}] ${message}`, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (Logger.level <= LogLevel.INFO) {
      console.info(`[vigil:${this.namespace}] ${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (Logger.level <= LogLevel.WARN) {
      console.warn(`[vigil:${this.namespace}] ${message}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (Logger.level <= LogLevel.ERROR) {
      console.error(`[vigil:${this.namespace}] ${message}`, ...args);
    }
  }

  /**
   * Set the global log level
   */
  static setLevel(level: LogLevelName): void {
    Logger.level = levelMap[level];
  }
}

/**
 * Get a logger instance for a specific namespace
 *
 * @param namespace - The namespace for this logger
 */
export function getLogger(namespace: string): Logger {
  return new Logger(namespace);
}

/**
 * Configure logging from an explicit level, falling back to `VIGIL_LOG_LEVEL`
 */
export function configureLogging(level?: LogLevelName): void {
  if (level) {
    Logger.setLevel(level);
    return;
  }

  const fromEnv = process.env.VIGIL_LOG_LEVEL?.toLowerCase();
  if (fromEnv && isLogLevelName(fromEnv)) {
    Logger.setLevel(fromEnv);
  }
}
