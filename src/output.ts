import { VerbosityError } from "./errors.js";
import type { LogLevel } from "./types.js";

export type Logger = {
  warn: (msg: string) => void;
  info: (msg: string) => void;
  debug: (msg: string) => void;
  error: (msg: string) => void;
};

export type LogSink = (line: string) => void;

const LEVELS_BY_VERBOSITY: readonly LogLevel[] = ["warn", "info", "debug"];

export function resolveLogLevel(verbosity: number): LogLevel {
  const level = LEVELS_BY_VERBOSITY[verbosity];
  if (!Number.isInteger(verbosity) || verbosity < 0 || level === undefined) {
    throw new VerbosityError(verbosity);
  }
  return level;
}

const stderrSink: LogSink = (line) => {
  process.stderr.write(line);
};

export function createLogger(level: LogLevel, sink: LogSink = stderrSink): Logger {
  const shouldLog = (target: LogLevel) => {
    const rank: Record<LogLevel, number> = {
      warn: 0,
      info: 1,
      debug: 2,
    };
    return rank[level] >= rank[target];
  };

  return {
    warn: (msg) => {
      if (shouldLog("warn")) sink(`WARNING: ${msg}\n`);
    },
    info: (msg) => {
      if (shouldLog("info")) sink(`INFO: ${msg}\n`);
    },
    debug: (msg) => {
      if (shouldLog("debug")) sink(`DEBUG: ${msg}\n`);
    },
    error: (msg) => {
      sink(`${msg}\n`);
    },
  };
}

/**
 * Builds the process logger from the `-v` count. Called once per invocation,
 * before any configuration is read.
 */
export function setupLogging(verbosity: number, sink?: LogSink): Logger {
  return createLogger(resolveLogLevel(verbosity), sink);
}

export function formatPlain(data: unknown): string {
  if (typeof data === "string") {
    return data.endsWith("\n") ? data : `${data}\n`;
  }
  return `${JSON.stringify(data, null, 2)}\n`;
}

export function writeOutput(content: string): void {
  process.stdout.write(content);
}
