export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  setLevel(level: LogLevel): void;
}

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

class ConsoleLogger implements Logger {
  private level: LogLevel;
  private prefix: string;

  constructor(prefix: string = "", level: LogLevel = "info") {
    this.prefix = prefix;
    this.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    const currentLevelIndex = LOG_LEVELS.indexOf(this.level);
    const messageLevelIndex = LOG_LEVELS.indexOf(level);

    return currentLevelIndex <= messageLevelIndex && this.level !== "silent";
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog("debug")) {
      console.log(`${this.prefix}${message}`, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog("info")) {
      console.log(`${this.prefix}${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog("warn")) {
      console.warn(`${this.prefix}${message}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog("error")) {
      console.error(`${this.prefix}${message}`, ...args);
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }
}

/**
 * Resolve the level for a new logger: explicit level, then LOG_LEVEL,
 * then silent under tests, then info.
 */
export function resolveLogLevel(level?: LogLevel, env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (level) return level;

  const fromEnv = env['LOG_LEVEL'];
  if (isLogLevel(fromEnv)) return fromEnv;

  return env['NODE_ENV'] === "test" ? "silent" : "info";
}

export function createLogger(prefix: string = "", level?: LogLevel): Logger {
  return new ConsoleLogger(prefix, resolveLogLevel(level));
}
