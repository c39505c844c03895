type LogLevel = "debug" | "info" | "warn" | "error";

type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

function getMinLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) return envLevel;
  if (process.env.NODE_ENV === "test") return "warn";
  return process.env.NODE_ENV === "production" ? "info" : "debug";
}

function format(level: LogLevel, message: string, context?: LogContext): string {
  const base = `[${new Date().toISOString()}] ${level.toUpperCase()}: ${message}`;
  if (context && Object.keys(context).length > 0) {
    return `${base} ${JSON.stringify(context)}`;
  }
  return base;
}

function log(level: LogLevel, message: string, context?: LogContext) {
  if (LOG_LEVELS[level] < LOG_LEVELS[getMinLevel()]) return;

  const line = format(level, message, context);
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
}

/**
 * Create a child logger with preset context
 */
export function createLogger(baseContext: LogContext = {}): Logger {
  const withBase = (context?: LogContext) => ({ ...baseContext, ...context });
  return {
    debug: (message, context) => log("debug", message, withBase(context)),
    info: (message, context) => log("info", message, withBase(context)),
    warn: (message, context) => log("warn", message, withBase(context)),
    error: (message, context) => log("error", message, withBase(context)),
  };
}

export const logger = createLogger();

/**
 * Log-friendly shape of a thrown value
 */
export function errorContext(error: unknown): LogContext {
  if (error instanceof Error) {
    return { error: error.message, name: error.name, stack: error.stack };
  }
  return { error: String(error) };
}

/**
 * Timer utility for performance logging
 */
export function createTimer(label: string, target: Logger = logger) {
  const start = performance.now();
  return {
    end: (context?: LogContext) => {
      const duration = performance.now() - start;
      target.debug(`${label} completed`, { durationMs: duration.toFixed(2), ...context });
      return duration;
    },
  };
}
