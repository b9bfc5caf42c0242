/**
 * Error reporting for the command layer.
 *
 * Commands catch what escapes the builder, log it here and turn it into
 * a process exit status.
 *
 * Dependency direction:
 *   This module imports from: errors, logger
 *   It should NOT import from: builder, commands, cli
 */

import {
  ConfigError,
  DependencyLoopError,
  DockerError,
  DockerNotFoundError,
  DuplicateImageError,
  ImageTreeError,
  MissingDependencyError,
  ScanError,
  ValidationError,
  extractErrorDetails,
} from "./errors.js";
import { log } from "./logger.js";

/** Process exit statuses. */
export enum ExitCode {
  SUCCESS = 0,
  /** Some images failed to build, verify, publish, prune or update */
  PARTIAL_FAILURE = 1,
  /** Bad arguments or configuration */
  USAGE = 2,
  /** The image tree itself is inconsistent */
  TREE = 3,
  /** The container engine is unusable */
  ENGINE = 4,
  UNEXPECTED = 70,
}

const SENSITIVE_KEY_PATTERN = /(password|secret|token|key|auth|credential)/i;

/**
 * Exit status for an error that aborted a command.
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ConfigError || error instanceof ValidationError) {
    return ExitCode.USAGE;
  }
  if (
    error instanceof ScanError ||
    error instanceof DuplicateImageError ||
    error instanceof DependencyLoopError ||
    error instanceof MissingDependencyError
  ) {
    return ExitCode.TREE;
  }
  if (error instanceof DockerError) {
    return ExitCode.ENGINE;
  }
  if (error instanceof ImageTreeError) {
    return ExitCode.PARTIAL_FAILURE;
  }
  return ExitCode.UNEXPECTED;
}

/**
 * Log an error with context.
 *
 * @param operation - What was being done, e.g. "scan images"
 * @param details - Extra context; keys that look like credentials are dropped
 */
export function logError(error: unknown, operation: string, details?: Record<string, unknown>): void {
  log.error(`Failed to ${operation}: ${extractErrorDetails(error)}`);
  log.red(`Failed to ${operation}: ${error instanceof Error ? error.message : String(error)}`);

  if (error instanceof DockerNotFoundError) {
    log.dim("Is the docker CLI installed and on PATH?");
  }

  if (details) {
    const detailsStr = Object.entries(details)
      .filter(([k]) => !SENSITIVE_KEY_PATTERN.test(k))
      .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
      .join(", ");
    log.dim(`Context: ${detailsStr}`);
  }

  if (error instanceof Error && error.stack) {
    log.debug(error.stack);
  }
}
