import path from "path";
import chalk from "chalk";
import fs from "fs-extra";
import { PATHS } from "./config.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Logging capability handed to the orchestrator and dispatcher.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const levelWeight: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

const formatters: Record<LogLevel, (message: string) => string> = {
  debug: message => chalk.gray(`[DEBUG] ${message}`),
  info: message => chalk.blue(`[INFO] ${message}`),
  warn: message => chalk.yellow(`[WARN] ${message}`),
  error: message => chalk.red(`[ERROR] ${message}`)
};

/**
 * Narrow an arbitrary string to a log level.
 *
 * @returns The matching level, or undefined when unrecognised.
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const candidate = value?.trim().toLowerCase();
  switch (candidate) {
    case "debug":
    case "info":
    case "warn":
    case "error":
      return candidate;
    default:
      return undefined;
  }
}

export interface ConsoleLoggerOptions {
  readonly level?: LogLevel;
  /** Plain-text file every emitted line is appended to. */
  readonly file?: string;
}

/**
 * Console logger with level filtering and an optional file sink.
 */
export class ConsoleLogger implements Logger {
  private level: LogLevel;
  private file?: string;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.setFile(options.file);
  }

  /**
   * Append every emitted line to `file` from now on; undefined or empty stops appending.
   */
  setFile(file: string | undefined): void {
    if (file) {
      fs.ensureDirSync(path.dirname(file));
    }
    this.file = file || undefined;
  }

  /**
   * Change the minimum level emitted from now on.
   *
   * @throws Error if level is not recognised.
   */
  setLevel(level: LogLevel): void {
    if (levelWeight[level] === undefined) {
      throw new Error(`Unsupported log level: ${level}`);
    }
    this.level = level;
  }

  debug(message: string): void {
    this.emit("debug", message);
  }

  info(message: string): void {
    this.emit("info", message);
  }

  warn(message: string): void {
    this.emit("warn", message);
  }

  error(message: string): void {
    this.emit("error", message);
  }

  private emit(level: LogLevel, message: string): void {
    if (levelWeight[level] < levelWeight[this.level]) {
      return;
    }
    const line = formatters[level](message);
    if (level === "error" || level === "warn") {
      console.error(line);
    } else {
      console.log(line);
    }
    if (this.file) {
      fs.appendFileSync(this.file, `${new Date().toISOString()} - ${level.toUpperCase()} - ${message}\n`);
    }
  }
}

/**
 * Process-level logger used by the CLI entry point. Console only until
 * `useLogFile` attaches the file sink.
 */
export const logger = new ConsoleLogger({
  level: parseLogLevel(process.env.SSL_MONITOR_LOG_LEVEL) ?? "info"
});

export function setLogLevel(level: LogLevel): void {
  logger.setLevel(level);
}

export function useLogFile(file: string = PATHS.LOG_FILE): void {
  logger.setFile(file);
}

export function debug(message: string): void {
  logger.debug(message);
}

export function info(message: string): void {
  logger.info(message);
}

export function error(message: string): void {
  logger.error(message);
}
