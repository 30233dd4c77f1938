/**
 * Structured logger with JSON output support.
 *
 * - LOG_LEVEL picks the minimum level (debug | info | warn | error, default info)
 * - LOG_FORMAT=json emits one JSON object per line
 * - `command` and `parseId` context ties entries to a single parse pass
 * - child loggers inherit the parent's context and level
 *
 * Output goes to stderr so it never mixes with usage/help output.
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
  /** Name of the root command being parsed. */
  command?: string;
  /** Identifier of a single parse pass. */
  parseId?: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(name: string): Logger;
  /** Merge persistent context fields (command, parseId, ...). */
  setContext(ctx: LogContext): void;
  /** Whether a message at `level` would be written. */
  isEnabled(level: LogLevel): boolean;
  /** Start a timer. The returned stop function logs at debug and returns the duration in ms. */
  time(label: string): () => number;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

function resolveMinLevel(explicit?: LogLevel): LogLevel {
  if (explicit) return explicit;
  const env = (process.env.LOG_LEVEL ?? "").toLowerCase();
  return isLogLevel(env) ? env : "info";
}

function isJsonFormat(): boolean {
  return process.env.LOG_FORMAT?.toLowerCase() === "json";
}

function hasData(data?: Record<string, unknown>): data is Record<string, unknown> {
  return data !== undefined && Object.keys(data).length > 0;
}

function formatJson(
  level: LogLevel,
  module: string,
  message: string,
  context: LogContext,
  data?: Record<string, unknown>,
): string {
  const entry: Record<string, unknown> = {
    timestamp: new Date().toISOString(),
    level,
    module,
    message,
  };
  if (context.command) entry.command = context.command;
  if (context.parseId) entry.parse_id = context.parseId;
  if (hasData(data)) Object.assign(entry, data);
  return JSON.stringify(entry);
}

function formatText(
  level: LogLevel,
  module: string,
  message: string,
  context: LogContext,
  data?: Record<string, unknown>,
): string {
  const scope = context.command ? `${module}@${context.command}` : module;
  const line = `[${new Date().toISOString()}] [${level.toUpperCase()}] [${scope}] ${message}`;
  return hasData(data) ? `${line} ${JSON.stringify(data)}` : line;
}

export function createLogger(
  name: string,
  minLevel?: LogLevel,
  parentContext?: LogContext,
): Logger {
  const level = resolveMinLevel(minLevel);
  const minPriority = LEVEL_PRIORITY[level];
  const format = isJsonFormat() ? formatJson : formatText;
  let context: LogContext = { ...parentContext };

  function enabled(at: LogLevel): boolean {
    return LEVEL_PRIORITY[at] >= minPriority;
  }

  function log(at: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!enabled(at)) return;
    console.error(format(at, name, message, context, data));
  }

  return {
    debug: (msg, data) => log("debug", msg, data),
    info: (msg, data) => log("info", msg, data),
    warn: (msg, data) => log("warn", msg, data),
    error: (msg, data) => log("error", msg, data),
    child: (childName) => createLogger(`${name}:${childName}`, level, { ...context }),
    setContext(ctx: LogContext): void {
      context = { ...context, ...ctx };
    },
    isEnabled: enabled,
    time(label: string): () => number {
      const start = performance.now();
      return () => {
        const durationMs = Math.round((performance.now() - start) * 100) / 100;
        log("debug", `${label} completed`, { label, durationMs });
        return durationMs;
      };
    },
  };
}
