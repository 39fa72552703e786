/**
 * Lightweight logging utility.
 * Writes timestamped lines with run ID and component to the console and/or
 * a log file.
 */

import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";
import { getRunId } from "./run-id.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogContext = Record<string, unknown>;

export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Directory for log files */
  logDir?: string;
  /** Log file name (without path) */
  logFile?: string;
  /** Enable console output */
  console?: boolean;
  /** Enable file output */
  file?: boolean;
  /** Component name printed in every line */
  component?: string;
  /**
   * Receives every formatted line that passes the level filter.
   * Used by tests to capture output.
   */
  sink?: (level: LogLevel, line: string) => void;
}

const DEFAULT_OPTIONS = {
  level: "info",
  logDir: "output/logs",
  logFile: "topic-notes.log",
  console: true,
  file: true,
} as const satisfies LoggerOptions;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /**
   * Derive a logger that prefixes a component and merges `bindings` into
   * the context of every entry.
   */
  child(component: string, bindings?: LogContext): Logger;
}

/**
 * Format a log entry with timestamp, level, run ID, component and message.
 */
export function formatLogEntry(
  level: LogLevel,
  message: string,
  context?: LogContext,
  component?: string,
  now: Date = new Date()
): string {
  const runId = getRunId() ?? "no-run-id";
  const levelStr = level.toUpperCase().padEnd(5);
  const componentStr = component ? ` [${component}]` : "";

  let entry = `[${now.toISOString()}] [${levelStr}] [${runId}]${componentStr} ${message}`;

  if (context && Object.keys(context).length > 0) {
    entry += ` ${JSON.stringify(context, errorReplacer)}`;
  }

  return entry;
}

/**
 * Errors stringify to `{}` by default; keep their name and message.
 */
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

function getConsoleMethod(level: LogLevel): typeof console.log {
  switch (level) {
    case "debug":
      return console.debug;
    case "info":
      return console.info;
    case "warn":
      return console.warn;
    case "error":
      return console.error;
  }
}

/**
 * Create a logger instance.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? DEFAULT_OPTIONS.level;
  const logDir = options.logDir ?? DEFAULT_OPTIONS.logDir;
  const toConsole = options.console ?? DEFAULT_OPTIONS.console;
  const toFile = options.file ?? DEFAULT_OPTIONS.file;
  const logFilePath = join(logDir, options.logFile ?? DEFAULT_OPTIONS.logFile);

  if (toFile && !existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  function write(entryLevel: LogLevel, line: string): void {
    if (options.sink) {
      options.sink(entryLevel, line);
    }

    if (toConsole) {
      getConsoleMethod(entryLevel)(line);
    }

    if (toFile) {
      try {
        appendFileSync(logFilePath, line + "\n");
      } catch (err) {
        // Fall back to console if the file write fails
        console.error(`Failed to write to log file: ${err}`);
      }
    }
  }

  function build(component: string | undefined, bindings: LogContext): Logger {
    function log(entryLevel: LogLevel, message: string, context?: LogContext): void {
      if (LOG_LEVEL_PRIORITY[entryLevel] < LOG_LEVEL_PRIORITY[level]) {
        return;
      }
      const merged = context ? { ...bindings, ...context } : bindings;
      write(entryLevel, formatLogEntry(entryLevel, message, merged, component));
    }

    return {
      debug: (message, context) => log("debug", message, context),
      info: (message, context) => log("info", message, context),
      warn: (message, context) => log("warn", message, context),
      error: (message, context) => log("error", message, context),
      child: (childComponent, childBindings = {}) =>
        build(
          component ? `${component}:${childComponent}` : childComponent,
          { ...bindings, ...childBindings }
        ),
    };
  }

  return build(options.component, {});
}

/**
 * Logger that discards everything. Default for library consumers that do
 * not pass one.
 */
export function createSilentLogger(): Logger {
  return createLogger({ console: false, file: false });
}
