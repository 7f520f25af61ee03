/* eslint-disable no-console -- this IS the logger module */
import os from "node:os";

export type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  fatal(message: string, context?: LogContext): void;
  child(bindings: LogContext): Logger;
}

const LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

const SENSITIVE_KEYS = [
  "password",
  "passwordhash",
  "token",
  "secret",
  "email",
  "authorization",
  "apikey",
  "cookie",
];

const REDACTED = "***";

const isSensitiveKey = (key: string): boolean => {
  const normalized = key.toLowerCase().replace(/[-_]/g, "");
  return SENSITIVE_KEYS.some((k) => normalized.includes(k));
};

export function redact(value: unknown, depth = 0): unknown {
  if (depth > 5 || value === null || typeof value !== "object") return value;
  if (value instanceof Date) return value;
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  if (Array.isArray(value)) return value.map((item) => redact(item, depth + 1));
  return redactFields(value, depth);
}

function redactFields(fields: object, depth = 0): LogContext {
  const out: LogContext = {};
  for (const [key, val] of Object.entries(fields)) {
    out[key] = isSensitiveKey(key) ? REDACTED : redact(val, depth + 1);
  }
  return out;
}

function resolveMinLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL;
  if (configured === "debug" || configured === "info" || configured === "warn" || configured === "error") {
    return configured;
  }
  return "info";
}

const CONSOLE_METHOD: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.info(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
  fatal: (...args) => console.error(...args),
};

class ConsoleLogger implements Logger {
  private readonly minLevel: number;
  private readonly json: boolean;

  constructor(private readonly bindings: LogContext = {}) {
    this.minLevel = LEVEL_VALUES[resolveMinLevel()];
    // Log aggregators ingest one JSON object per line in production
    this.json = process.env.NODE_ENV === "production";
  }

  debug(message: string, context?: LogContext) {
    this.write("debug", message, context);
  }

  info(message: string, context?: LogContext) {
    this.write("info", message, context);
  }

  warn(message: string, context?: LogContext) {
    this.write("warn", message, context);
  }

  error(message: string, context?: LogContext) {
    this.write("error", message, context);
  }

  fatal(message: string, context?: LogContext) {
    this.write("fatal", message, context);
  }

  child(bindings: LogContext): Logger {
    return new ConsoleLogger({ ...this.bindings, ...bindings });
  }

  private write(level: LogLevel, message: string, context?: LogContext) {
    if (LEVEL_VALUES[level] < this.minLevel) return;

    const fields = redactFields({ ...this.bindings, ...context });
    const timestamp = new Date().toISOString();
    const emit = CONSOLE_METHOD[level];

    if (this.json) {
      emit(
        JSON.stringify({
          timestamp,
          level: LEVEL_VALUES[level],
          levelName: level,
          message,
          hostname: os.hostname(),
          pid: process.pid,
          ...fields,
        })
      );
      return;
    }

    const suffix = Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : "";
    emit(`[${timestamp}] [${level.toUpperCase()}] ${message}${suffix}`);
  }
}

const logger: Logger = new ConsoleLogger();

export function createChildLogger(bindings: LogContext): Logger {
  return logger.child(bindings);
}

export default logger;
