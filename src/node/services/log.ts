/**
 * Unified logging for llamakeeper (library + CLI)
 *
 * Features:
 * - Log levels: error, warn, info, debug (hierarchical)
 * - EPIPE protection for piped output
 * - Caller file:line prefix for debugging
 * - Colored output in TTY
 *
 * Log level selection (in priority order):
 * 1. LLAMAKEEPER_LOG_LEVEL env var (error|warn|info|debug)
 * 2. LLAMAKEEPER_DEBUG=1 → debug level
 * 3. Otherwise → error level (quiet by default)
 *
 * Use log.setLevel() to override programmatically (e.g., --verbose flag).
 */

import chalk from "chalk";
import { parseBoolEnv } from "@/common/utils/env";

export type LogFields = Record<string, unknown>;

export interface Logger {
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
  setLevel: (level: LogLevel) => void;
  getLevel: () => LogLevel;
  isDebugMode: () => boolean;
  withFields: (fields: LogFields) => Logger;
}
export type LogLevel = "error" | "warn" | "info" | "debug";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_PRIORITY;
}

function getDefaultLogLevel(): LogLevel {
  const envLevel = process.env.LLAMAKEEPER_LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }

  if (parseBoolEnv(process.env.LLAMAKEEPER_DEBUG)) {
    return "debug";
  }

  return "error";
}

let currentLogLevel: LogLevel = getDefaultLogLevel();

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[currentLogLevel];
}

function isDebugMode(): boolean {
  return currentLogLevel === "debug";
}

function supportsColor(): boolean {
  return process.stdout.isTTY ?? false;
}

/**
 * Kitchen time timestamp (12-hour format with milliseconds)
 * Format: 8:23.456PM
 */
function getTimestamp(): string {
  const now = new Date();
  const hours = now.getHours() % 12 || 12;
  const ampm = now.getHours() >= 12 ? "PM" : "AM";
  const mm = String(now.getMinutes()).padStart(2, "0");
  const ms = String(now.getMilliseconds()).padStart(3, "0");
  return `${hours}:${mm}.${ms}${ampm}`;
}

/**
 * Get the caller's file path and line number from the stack trace
 * Returns format: "node/services/llm/serverSupervisor.ts:123"
 */
function getCallerLocation(): string {
  const stack = new Error().stack?.split("\n");

  // 0: "Error", 1: getCallerLocation, 2: safePipeLog, 3: log.<level>, 4: caller
  if (stack && stack.length > 4) {
    const callerLine = stack[4];
    const match = /\((.+):(\d+):\d+\)/.exec(callerLine) ?? /at (.+):(\d+):\d+/.exec(callerLine);

    if (match) {
      const [, filePath, lineNum] = match;
      const relativePath = filePath.replace(/^.*\/(src|dist)\//, "");
      return `${relativePath}:${lineNum}`;
    }
  }

  return "unknown:0";
}

/**
 * Pipe-safe logging function with styled timestamp and caller location
 * Format: 8:23.456PM node/services/llm/serverSupervisor.ts:23 <message>
 */
function safePipeLog(level: LogLevel, ...args: unknown[]): void {
  if (!shouldLog(level)) {
    return;
  }

  const timestamp = getTimestamp();
  const location = getCallerLocation();
  const useColor = supportsColor();

  const prefix = useColor
    ? `${chalk.dim(timestamp)} ${level === "debug" ? chalk.gray(location) : chalk.cyan(location)}`
    : `${timestamp} ${location}`;

  try {
    if (level === "error" || level === "warn") {
      const paint = level === "error" ? chalk.red : chalk.yellow;
      // Diagnostics go to stderr so CLI output on stdout stays parseable
      console.error(
        prefix,
        ...(useColor ? args.map((arg) => (typeof arg === "string" ? paint(arg) : arg)) : args)
      );
    } else {
      console.log(prefix, ...args);
    }
  } catch (error) {
    const errorCode =
      error && typeof error === "object" && "code" in error ? error.code : undefined;
    const errorMessage =
      error && typeof error === "object" && "message" in error
        ? String(error.message)
        : "Unknown error";

    if (errorCode !== "EPIPE") {
      try {
        const stream = level === "error" || level === "warn" ? process.stderr : process.stdout;
        stream.write(`${timestamp} ${location} Console error: ${errorMessage}\n`);
      } catch {
        // Even the fallback might fail, just ignore
      }
    }
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value) || value instanceof Error) {
    return false;
  }
  const proto = Object.getPrototypeOf(value) as object | null;
  return proto === Object.prototype || proto === null;
}

function normalizeFields(fields?: LogFields): LogFields | undefined {
  return fields && Object.keys(fields).length > 0 ? fields : undefined;
}

function appendFieldsToArgs(args: unknown[], fields?: LogFields): unknown[] {
  if (!fields) {
    return args;
  }
  if (args.length === 0) {
    return [fields];
  }
  const lastArg = args[args.length - 1];
  if (isPlainObject(lastArg)) {
    return [...args.slice(0, -1), { ...fields, ...lastArg }];
  }
  return [...args, fields];
}

function createLogger(boundFields?: LogFields): Logger {
  const normalizedFields = normalizeFields(boundFields);
  const logAtLevel =
    (level: LogLevel) =>
    (...args: unknown[]): void => {
      safePipeLog(level, ...appendFieldsToArgs(args, normalizedFields));
    };

  return {
    setLevel: (level: LogLevel): void => {
      currentLogLevel = level;
    },
    getLevel: (): LogLevel => currentLogLevel,
    isDebugMode,
    info: logAtLevel("info"),
    warn: logAtLevel("warn"),
    error: logAtLevel("error"),
    debug: logAtLevel("debug"),
    withFields: (fields: LogFields): Logger =>
      createLogger(normalizeFields({ ...(normalizedFields ?? {}), ...fields })),
  };
}

/**
 * Unified logging interface
 *
 * Use log.withFields({ port }) to create a sub-logger that
 * automatically includes fields in every log entry.
 */
export const log = createLogger();
