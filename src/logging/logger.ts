/**
 * Session log.
 *
 * Each entry is one line: timestamp, level, run ID, message and a JSON
 * context. Entries are appended to `<logDir>/<logFile>` and can be mirrored
 * to the console. Child loggers share the parent's sink and add their own
 * context fields.
 */

import { appendFileSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import { getRunId } from "./run-id.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

type LogContext = Record<string, unknown>;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LoggerOptions {
  /** Minimum level written */
  level?: LogLevel;
  logDir?: string;
  logFile?: string;
  console?: boolean;
  file?: boolean;
  /** Fields attached to every entry */
  baseContext?: LogContext;
}

const DEFAULT_OPTIONS: Required<LoggerOptions> = {
  level: "info",
  logDir: "output/logs",
  logFile: "students.log",
  console: false,
  file: true,
  baseContext: {},
};

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Logger writing to the same place with `context` merged into every entry. */
  child(context: LogContext): Logger;
}

type Sink = (level: LogLevel, entry: string) => void;

export function formatLogEntry(
  level: LogLevel,
  message: string,
  context?: LogContext,
  now: Date = new Date()
): string {
  const runId = getRunId() ?? "no-run-id";
  const head = `[${now.toISOString()}] [${level.toUpperCase().padEnd(5)}] [${runId}] ${message}`;
  return context && Object.keys(context).length > 0 ? `${head} ${JSON.stringify(context)}` : head;
}

const CONSOLE_METHODS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

function bindLogger(sink: Sink, minLevel: LogLevel, context: LogContext): Logger {
  const log = (level: LogLevel, message: string, extra?: LogContext): void => {
    if (LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel]) {
      sink(level, formatLogEntry(level, message, { ...context, ...extra }));
    }
  };

  return {
    debug: (message, extra) => log("debug", message, extra),
    info: (message, extra) => log("info", message, extra),
    warn: (message, extra) => log("warn", message, extra),
    error: (message, extra) => log("error", message, extra),
    child: (more) => bindLogger(sink, minLevel, { ...context, ...more }),
  };
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const opts: Required<LoggerOptions> = { ...DEFAULT_OPTIONS, ...options };
  const logFilePath = join(opts.logDir, opts.logFile);

  if (opts.file) {
    mkdirSync(opts.logDir, { recursive: true });
  }

  const sink: Sink = (level, entry) => {
    if (opts.console) {
      CONSOLE_METHODS[level](entry);
    }
    if (opts.file) {
      try {
        appendFileSync(logFilePath, entry + "\n");
      } catch (err) {
        // The session goes on without its log file.
        console.error(`Failed to write to log file: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  };

  return bindLogger(sink, opts.level, opts.baseContext);
}

/**
 * Logger that discards every entry.
 */
export function createSilentLogger(): Logger {
  return bindLogger(() => undefined, "error", {});
}
