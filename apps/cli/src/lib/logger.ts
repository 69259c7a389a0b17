import { appendFileSync } from "fs";
import type { LogLevel } from "@cvslurm/shared";
import { levelColor } from "./theme.ts";
import { errorMessage } from "./errors.ts";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogSink {
  write(chunk: string): unknown;
}

export interface Logger {
  readonly level: LogLevel;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  isEnabled(level: LogLevel): boolean;
}

export interface LoggerOptions {
  level: LogLevel;
  /** Defaults to stdout. The discovery worker logs to stderr. */
  stream?: LogSink;
  /** Append-only copy of every line, written without color. */
  file?: string;
  color?: boolean;
  clock?: () => Date;
}

export function parseLogLevel(raw: string | undefined, fallback: LogLevel): LogLevel {
  switch (raw?.trim().toLowerCase()) {
    case "debug":
      return "debug";
    case "info":
      return "info";
    case "warn":
    case "warning":
      return "warn";
    case "error":
      return "error";
    default:
      return fallback;
  }
}

export function createLogger(options: LoggerOptions): Logger {
  const stream = options.stream ?? process.stdout;
  const color = options.color ?? true;
  const clock = options.clock ?? (() => new Date());
  let file = options.file;

  const isEnabled = (level: LogLevel) =>
    LEVEL_RANK[level] >= LEVEL_RANK[options.level];

  const emit = (level: LogLevel, message: string) => {
    if (!isEnabled(level)) return;

    const timestamp = clock().toISOString();
    const label = level.toUpperCase();
    const plain = `${timestamp} - ${label} - ${message}\n`;
    stream.write(
      color ? `${timestamp} - ${levelColor[level](label)} - ${message}\n` : plain,
    );

    if (!file) return;
    try {
      appendFileSync(file, plain);
    } catch (error) {
      // Report once, then keep logging to the stream only
      process.stderr.write(
        `Cannot write log file ${file}: ${errorMessage(error)}\n`,
      );
      file = undefined;
    }
  };

  return {
    level: options.level,
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message),
    isEnabled,
  };
}
