/**
 * Unified logging abstraction for imagetree.
 *
 * Two channels share one level filter:
 *   - diagnostics (debug/info/warn/error), which go to the log file when one
 *     is configured and to the terminal otherwise;
 *   - operator output (success/dim/bold/raw/...), which always goes to the
 *     terminal.
 *
 * All imagetree output MUST go through this module.
 */

import { appendFileSync } from "node:fs";

import { format } from "date-fns";
import pc from "picocolors";

/** Log levels in order of verbosity (debug is most verbose). */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

/** Logger configuration. */
interface LoggerConfig {
  level: LogLevel;
  /** Diagnostics sink; null writes diagnostics to the terminal */
  file: string | null;
}

const config: LoggerConfig = {
  level: LogLevel.INFO,
  file: null,
};

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "DEBUG",
  [LogLevel.INFO]: "INFO",
  [LogLevel.WARN]: "WARNING",
  [LogLevel.ERROR]: "ERROR",
  [LogLevel.SILENT]: "SILENT",
};

function canOutput(level: LogLevel): boolean {
  return config.level <= level;
}

/**
 * Set the minimum log level. Messages below this level are suppressed.
 */
export function setLogLevel(level: LogLevel): void {
  config.level = level;
}

/**
 * Send diagnostics to a file instead of the terminal. Pass null to restore
 * terminal output.
 */
export function setLogFile(path: string | null): void {
  config.file = path;
}

export function getLogFile(): string | null {
  return config.file;
}

/**
 * Write one diagnostic line, either to the log file or to the terminal.
 */
function emit(level: LogLevel, message: string, scope?: string): void {
  if (!canOutput(level)) {
    return;
  }
  const scoped = scope ? `${scope}: ${message}` : message;

  if (config.file !== null) {
    const stamp = format(new Date(), "yyyy-MM-dd HH:mm:ss");
    appendFileSync(config.file, `${stamp} [imagetree] ${LEVEL_NAMES[level]} - ${scoped}\n`);
    return;
  }

  switch (level) {
    case LogLevel.DEBUG:
      console.log(pc.dim(scoped));
      break;
    case LogLevel.WARN:
      console.warn(pc.yellow(scoped));
      break;
    case LogLevel.ERROR:
      console.error(pc.red(scoped));
      break;
    default:
      console.log(scoped);
  }
}

/** Diagnostic logger bound to a scope, e.g. one image label. */
export interface ScopedLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Logger object with level-aware methods.
 *
 * Usage:
 *   log.info("normal output")
 *   log.child("foo:1.0").info("build step")
 *   log.success("completed!")
 */
export const log = {
  debug(message: string): void {
    emit(LogLevel.DEBUG, message);
  },

  info(message: string): void {
    emit(LogLevel.INFO, message);
  },

  warn(message: string): void {
    emit(LogLevel.WARN, message);
  },

  error(message: string): void {
    emit(LogLevel.ERROR, message);
  },

  /**
   * Diagnostics prefixed with a scope (used for per-image build output).
   */
  child(scope: string): ScopedLogger {
    return {
      debug: (message: string) => emit(LogLevel.DEBUG, message, scope),
      info: (message: string) => emit(LogLevel.INFO, message, scope),
      warn: (message: string) => emit(LogLevel.WARN, message, scope),
      error: (message: string) => emit(LogLevel.ERROR, message, scope),
    };
  },

  /** Success message, green, on the terminal. */
  success(message: string): void {
    console.log(pc.green(message));
  },

  /** Subtle message, dim, on the terminal. */
  dim(message: string): void {
    console.log(pc.dim(message));
  },

  /** Emphasized message, bold, on the terminal. */
  bold(message: string): void {
    console.log(pc.bold(message));
  },

  /** Highlighted warning for the operator, yellow, on the terminal. */
  yellow(message: string): void {
    console.log(pc.yellow(message));
  },

  /** Operator-visible failure line, red, on the terminal. */
  red(message: string): void {
    console.log(pc.red(message));
  },

  /** Output without any styling. */
  raw(message: string): void {
    console.log(message);
  },
};
