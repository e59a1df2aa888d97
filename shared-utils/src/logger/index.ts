/**
 * Logging contract shared by every workspace
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.toLowerCase()) {
    case "debug":
      return "debug";
    case "warn":
      return "warn";
    case "error":
      return "error";
    default:
      return "info";
  }
}

/**
 * Default console logger implementation
 * Messages below the configured level are dropped.
 */
export class ConsoleLogger implements Logger {
  constructor(
    private serviceName: string,
    private level: LogLevel = "info"
  ) {}

  debug(message: string, ...args: unknown[]): void {
    if (this.enabled("debug")) {
      console.debug(`[${this.serviceName}] ${message}`, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.enabled("info")) {
      console.log(`[${this.serviceName}] ${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled("warn")) {
      console.warn(`[${this.serviceName}] ${message}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.enabled("error")) {
      console.error(`[${this.serviceName}] ${message}`, ...args);
    }
  }

  child(scope: string): ConsoleLogger {
    return new ConsoleLogger(`${this.serviceName}:${scope}`, this.level);
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }
}

/**
 * Logger that discards everything (tests)
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
