/**
 * Server logger
 *
 * Leveled logger over the console. Emits one JSON line per entry in
 * production (for log aggregation) and readable text everywhere else.
 * Level and output mode are read from the environment once, when the
 * module is loaded.
 *
 * @module logger
 */

import { hostname } from "node:os";

export type LogLevelName = "debug" | "info" | "warn" | "error" | "fatal";
export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  fatal(message: string, context?: LogContext): void;
  child(bindings: LogContext): Logger;
}

const LEVELS: Record<LogLevelName, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

const SENSITIVE_KEYS = new Set([
  "password",
  "token",
  "secret",
  "email",
  "authorization",
  "accesskeyid",
  "secretaccesskey",
  "sessiontoken",
  "cookie",
]);

const REDACTED = "***";

function isSensitiveKey(key: string): boolean {
  const lowered = key.toLowerCase();
  return SENSITIVE_KEYS.has(lowered) || lowered.includes("secret") || lowered.includes("token");
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

export function redact(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(redact);
  }
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (!isPlainObject(value)) {
    return value;
  }
  const out: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(value)) {
    out[key] = isSensitiveKey(key) ? REDACTED : redact(inner);
  }
  return out;
}

function isLevelName(value: string | undefined): value is LogLevelName {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVELS, value);
}

function resolveMinLevel(): number {
  const configured = process.env.LOG_LEVEL;
  return isLevelName(configured) ? LEVELS[configured] : LEVELS.info;
}

const CONSOLE_METHOD: Record<LogLevelName, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
  fatal: (line) => console.error(line),
};

class ConsoleLogger implements Logger {
  constructor(
    private readonly bindings: LogContext,
    private readonly minLevel: number,
    private readonly json: boolean
  ) {}

  debug(message: string, context?: LogContext): void {
    this.write("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write("warn", message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write("error", message, context);
  }

  fatal(message: string, context?: LogContext): void {
    this.write("fatal", message, context);
  }

  child(bindings: LogContext): Logger {
    return new ConsoleLogger({ ...this.bindings, ...bindings }, this.minLevel, this.json);
  }

  private write(level: LogLevelName, message: string, context?: LogContext): void {
    if (LEVELS[level] < this.minLevel) return;

    const fields = redact({ ...this.bindings, ...context });
    const timestamp = new Date().toISOString();

    if (this.json) {
      const entry = {
        timestamp,
        level: LEVELS[level],
        levelName: level,
        message,
        hostname: hostname(),
        pid: process.pid,
        ...(isPlainObject(fields) ? fields : {}),
      };
      CONSOLE_METHOD[level](JSON.stringify(entry));
      return;
    }

    const hasFields = isPlainObject(fields) && Object.keys(fields).length > 0;
    const suffix = hasFields ? ` ${JSON.stringify(fields)}` : "";
    CONSOLE_METHOD[level](`[${timestamp}] [${level.toUpperCase()}] ${message}${suffix}`);
  }
}

const logger: Logger = new ConsoleLogger(
  {},
  resolveMinLevel(),
  process.env.NODE_ENV === "production"
);

export function createChildLogger(bindings: LogContext): Logger {
  return logger.child(bindings);
}

export default logger;
