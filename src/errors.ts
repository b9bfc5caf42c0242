/**
 * Unified exception hierarchy for imagetree.
 *
 * All custom exceptions inherit from ImageTreeError for consistent error
 * handling. The CLI catches these and converts them to an exit status.
 *
 * Dependency direction:
 *   This module has NO internal dependencies (leaf module).
 *   It may be imported by: all other imagetree modules.
 */

/**
 * Base exception for all imagetree errors.
 */
export class ImageTreeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ImageTreeError";
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Configuration-related errors.
 *
 * Examples:
 *   - Configuration file parse errors
 *   - A key holding a value of the wrong type
 *   - An unsupported driver name
 */
export class ConfigError extends ImageTreeError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Invalid user input (CLI arguments, state names). */
export class ValidationError extends ImageTreeError {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * Docker operation errors.
 *
 * Base class for all Docker-related exceptions.
 */
export class DockerError extends ImageTreeError {
  constructor(message: string) {
    super(message);
    this.name = "DockerError";
  }
}

/** Raised when Docker is not installed or not in PATH. */
export class DockerNotFoundError extends DockerError {
  constructor(message = "Docker not found in PATH") {
    super(message);
    this.name = "DockerNotFoundError";
  }
}

/** Raised when a Docker operation times out. */
export class DockerTimeoutError extends DockerError {
  constructor(message = "Docker operation timed out") {
    super(message);
    this.name = "DockerTimeoutError";
  }
}

/** Raised when Docker image build fails. */
export class ImageBuildError extends DockerError {
  constructor(message: string) {
    super(message);
    this.name = "ImageBuildError";
  }
}

/**
 * An image directory could not be loaded during a scan. The whole scan is
 * aborted; the message names the offending directory.
 */
export class ScanError extends ImageTreeError {
  readonly directory: string;

  constructor(directory: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`The image in ${directory} could not be loaded: ${reason}`, { cause });
    this.name = "ScanError";
    this.directory = directory;
  }
}

/** Two image directories declare the same short name. */
export class DuplicateImageError extends ImageTreeError {
  readonly shortName: string;

  constructor(shortName: string) {
    super(`Image ${shortName} is declared more than once`);
    this.name = "DuplicateImageError";
    this.shortName = shortName;
  }
}

/** Malformed changelog or control file. */
export class MetadataError extends ImageTreeError {
  constructor(message: string) {
    super(message);
    this.name = "MetadataError";
  }
}

/** A dependency cycle was found while ordering images. */
export class DependencyLoopError extends ImageTreeError {
  readonly image: string;

  constructor(image: string) {
    super(`Dependency loop detected for image ${image}`);
    this.name = "DependencyLoopError";
    this.image = image;
  }
}

/** A declared dependency is not among the scanned images. */
export class MissingDependencyError extends ImageTreeError {
  readonly dependency: string;
  readonly dependent: string;

  constructor(dependency: string, dependent: string) {
    super(`Image ${dependency} (dependency of ${dependent}) not found`);
    this.name = "MissingDependencyError";
    this.dependency = dependency;
    this.dependent = dependent;
  }
}

/**
 * A state transition was requested from a state that does not allow it.
 * This is a bug in the caller, not a failed build.
 */
export class InvalidTransitionError extends ImageTreeError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidTransitionError";
  }
}

/** A version string cannot be bumped. */
export class VersionFormatError extends ImageTreeError {
  readonly version: string;

  constructor(version: string) {
    super(`Was not able to match version ${version}`);
    this.name = "VersionFormatError";
    this.version = version;
  }
}

/**
 * Extract error details from an unknown error for user-friendly messages.
 *
 * Handles execa-style errors with stderr/shortMessage, plus standard Error objects.
 * Truncates output to maxLength to avoid overwhelming log output.
 */
export function extractErrorDetails(error: unknown, maxLength = 1000): string {
  if (!(error instanceof Error)) {
    return String(error).slice(0, maxLength);
  }

  if ("stderr" in error && typeof error.stderr === "string" && error.stderr) {
    return error.stderr.slice(0, maxLength);
  }
  if ("shortMessage" in error && typeof error.shortMessage === "string" && error.shortMessage) {
    return error.shortMessage.slice(0, maxLength);
  }
  return error.message.slice(0, maxLength);
}
