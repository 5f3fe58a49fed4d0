/**
 * Structured Logging Utility
 * Consistent `key=value` log lines for the terminal and the backend.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  component: string;
  operation?: string;
  [key: string]: unknown;
}

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && (LEVELS as readonly string[]).includes(value);
}

/**
 * Level taken from LOG_LEVEL, falling back to "info".
 */
export function defaultLogLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL;
  return isLogLevel(fromEnv) ? fromEnv : "info";
}

/**
 * Structured logger with bound context
 */
export class Logger {
  constructor(
    private component: string,
    private minLevel: LogLevel = defaultLogLevel(),
    private boundContext: Partial<LogContext> = {},
  ) {}

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.minLevel);
  }

  private format(level: LogLevel, message: string, context?: Partial<LogContext>): string {
    const timestamp = new Date().toISOString();
    const ctx = { component: this.component, ...this.boundContext, ...context };
    const contextStr = Object.entries(ctx)
      .filter(([, v]) => v !== undefined)
      .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
      .join(" ");
    return `[${timestamp}] ${level.toUpperCase()} ${contextStr} - ${message}`;
  }

  debug(message: string, context?: Partial<LogContext>): void {
    if (this.shouldLog("debug")) {
      console.debug(this.format("debug", message, context));
    }
  }

  info(message: string, context?: Partial<LogContext>): void {
    if (this.shouldLog("info")) {
      console.info(this.format("info", message, context));
    }
  }

  warn(message: string, context?: Partial<LogContext>): void {
    if (this.shouldLog("warn")) {
      console.warn(this.format("warn", message, context));
    }
  }

  error(message: string, error?: Error, context?: Partial<LogContext>): void {
    if (this.shouldLog("error")) {
      const errorContext = error
        ? { ...context, error: error.message, stack: error.stack }
        : context;
      console.error(this.format("error", message, errorContext));
    }
  }

  /**
   * Create child logger with additional context
   */
  child(additionalContext: Partial<LogContext>): Logger {
    return new Logger(this.component, this.minLevel, {
      ...this.boundContext,
      ...additionalContext,
    });
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }
}

export function createLogger(component: string, level?: LogLevel): Logger {
  return new Logger(component, level ?? defaultLogLevel());
}

/**
 * Normalize an unknown thrown value for `Logger.error`.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
