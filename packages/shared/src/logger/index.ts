/**
 * Structured logger for the metrics runtime.
 *
 * Entries go to stderr, as text or as JSON lines when LOG_FORMAT=json. The minimum
 * level comes from LOG_LEVEL (default "info") unless the caller passes one. Child
 * loggers extend the module path and copy the parent's context at creation.
 */

import { performance } from "node:perf_hooks";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogContext {
  /** Identity key of the scope tree emitting the entry. */
  scopeId?: string;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(name: string): Logger;
  setContext(ctx: LogContext): void;
  /** Returns a stop function that logs `<label> completed` at debug and returns the elapsed ms. */
  time(label: string): () => number;
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

function resolveMinLevel(explicit?: LogLevel): LogLevel {
  if (explicit) return explicit;
  const env = (process.env.LOG_LEVEL ?? "").toLowerCase();
  return isLogLevel(env) ? env : "info";
}

/** Flatten an unknown thrown value into loggable fields. */
export function errorDetails(error: unknown): Record<string, unknown> {
  if (!(error instanceof Error)) {
    return { error: String(error) };
  }
  return {
    error: error.message,
    errorName: error.name,
    ...(error.cause !== undefined ? { cause: String(error.cause) } : {}),
  };
}

interface Entry {
  level: LogLevel;
  module: string;
  message: string;
  context: LogContext;
  data?: Record<string, unknown>;
}

function hasData(data?: Record<string, unknown>): data is Record<string, unknown> {
  return data !== undefined && Object.keys(data).length > 0;
}

function formatJson(entry: Entry, timestamp: string): string {
  return JSON.stringify({
    timestamp,
    level: entry.level,
    module: entry.module,
    message: entry.message,
    ...(entry.context.scopeId ? { scope_id: entry.context.scopeId } : {}),
    ...(hasData(entry.data) ? entry.data : {}),
  });
}

function formatText(entry: Entry, timestamp: string): string {
  const line = `[${timestamp}] [${entry.level.toUpperCase()}] [${entry.module}] ${entry.message}`;
  return hasData(entry.data) ? `${line} ${JSON.stringify(entry.data)}` : line;
}

export function createLogger(name: string, minLevel?: LogLevel, parentContext?: LogContext): Logger {
  const level = resolveMinLevel(minLevel);
  const format = process.env.LOG_FORMAT?.toLowerCase() === "json" ? formatJson : formatText;
  let context: LogContext = { ...parentContext };

  function log(entryLevel: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[entryLevel] < LEVEL_PRIORITY[level]) return;
    const entry: Entry = { level: entryLevel, module: name, message, context, data };
    console.error(format(entry, new Date().toISOString()));
  }

  return {
    debug: (msg, data) => log("debug", msg, data),
    info: (msg, data) => log("info", msg, data),
    warn: (msg, data) => log("warn", msg, data),
    error: (msg, data) => log("error", msg, data),
    child: (childName) => createLogger(`${name}:${childName}`, level, context),
    setContext(ctx: LogContext): void {
      context = { ...context, ...ctx };
    },
    time(label: string): () => number {
      const start = performance.now();
      return () => {
        const durationMs = Math.round((performance.now() - start) * 100) / 100;
        log("debug", `${label} completed`, { durationMs });
        return durationMs;
      };
    },
  };
}
