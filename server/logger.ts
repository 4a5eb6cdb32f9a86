/**
 * JSON logger on the console.
 *
 * Minimum level comes from LOG_LEVEL; without it, debug is only printed
 * outside production.
 */

type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(v: string | undefined): v is LogLevel {
  return v === "debug" || v === "info" || v === "warn" || v === "error";
}

function minLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL;
  if (isLogLevel(envLevel)) return envLevel;
  return process.env.NODE_ENV === "production" ? "info" : "debug";
}

function shouldLog(level: LogLevel) {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[minLevel()];
}

function formatEntry(level: LogLevel, message: string, context?: Record<string, unknown>) {
  const entry: Record<string, unknown> = {
    level,
    msg: message,
    ts: new Date().toISOString(),
  };
  if (context) Object.assign(entry, context);
  return JSON.stringify(entry);
}

export function errorContext(err: unknown): Record<string, unknown> {
  if (err instanceof Error) return { error: err.message, stack: err.stack };
  return { error: String(err) };
}

export const logger = {
  debug(message: string, context?: Record<string, unknown>) {
    if (!shouldLog("debug")) return;
    console.debug(formatEntry("debug", message, context));
  },

  info(message: string, context?: Record<string, unknown>) {
    if (!shouldLog("info")) return;
    console.info(formatEntry("info", message, context));
  },

  warn(message: string, context?: Record<string, unknown>) {
    if (!shouldLog("warn")) return;
    console.warn(formatEntry("warn", message, context));
  },

  error(message: string, context?: Record<string, unknown>) {
    if (!shouldLog("error")) return;
    console.error(formatEntry("error", message, context));
  },
};
