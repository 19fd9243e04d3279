/* Tiny logger with leveled output */
export type LogLevel = "info" | "warn" | "error" | "debug";

export type LogContext = Record<string, string | number | boolean | undefined>;

const levelOrder: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(levelOrder, value);
}

const envLevel = process.env.LOG_LEVEL?.trim().toLowerCase();
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

function shouldLog(level: LogLevel): boolean {
  return levelOrder[level] <= levelOrder[currentLevel];
}

function format(level: LogLevel, message: string, context?: LogContext): string {
  const timestamp = new Date().toISOString();
  const line = `[${timestamp}] [${level.toUpperCase()}] ${message}`;
  if (!context) {
    return line;
  }

  const fields = Object.entries(context)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${String(value)}`);

  return fields.length > 0 ? `${line} ${fields.join(" ")}` : line;
}

export const logger = {
  info: (message: string, context?: LogContext): void => {
    if (shouldLog("info")) {
      console.log(format("info", message, context));
    }
  },
  warn: (message: string, context?: LogContext): void => {
    if (shouldLog("warn")) {
      console.warn(format("warn", message, context));
    }
  },
  error: (message: string, error?: unknown, context?: LogContext): void => {
    if (shouldLog("error")) {
      console.error(format("error", message, context), error ?? "");
    }
  },
  debug: (message: string, context?: LogContext): void => {
    if (shouldLog("debug")) {
      console.debug(format("debug", message, context));
    }
  },
};
