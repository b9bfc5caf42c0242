/**
 * Docker command execution with consistent error handling.
 *
 * Core execution layer - all Docker commands flow through safeDockerRun
 * (captured output) or streamDockerRun (line-by-line output, for builds).
 */

import { execa, ExecaError } from "execa";

import { DOCKER_COMMAND_TIMEOUT } from "../constants.js";
import { DockerError, DockerNotFoundError, DockerTimeoutError } from "../errors.js";

/** Result of a Docker command execution */
export interface DockerResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface DockerRunOptions {
  timeout?: number;
  /** Throw DockerError on a non-zero exit code */
  check?: boolean;
  /** Data written to the command's stdin */
  input?: string;
}

/**
 * Environment for docker invocations: the caller's, without CLI hints that
 * would pollute captured output.
 */
export function getDockerEnv(): NodeJS.ProcessEnv {
  return { ...process.env, DOCKER_CLI_HINTS: "false" };
}

function describe(args: string[]): string {
  return `docker ${args.slice(0, 3).join(" ")}...`;
}

/**
 * Map an execa failure to a DockerResult, or throw for failures that are not
 * a plain non-zero exit.
 */
function failureToResult(error: unknown, args: string[], timeout: number): DockerResult {
  if (!(error instanceof ExecaError)) {
    throw error;
  }
  if (error.code === "ENOENT") {
    throw new DockerNotFoundError(`Docker not found in PATH. Command: ${describe(args)}`);
  }
  if (error.timedOut) {
    throw new DockerTimeoutError(`Docker command timed out after ${timeout}ms. Command: ${describe(args)}`);
  }
  return {
    exitCode: error.exitCode ?? 1,
    stdout: String(error.stdout ?? ""),
    stderr: String(error.stderr ?? ""),
  };
}

function checked(result: DockerResult, args: string[], check: boolean | undefined): DockerResult {
  if (check && result.exitCode !== 0) {
    const detail = result.stderr.trim();
    throw new DockerError(`Docker command failed: ${describe(args)}${detail ? ` (${detail})` : ""}`);
  }
  return result;
}

/**
 * Run a Docker command with consistent error handling.
 *
 * @param args - Command arguments (without 'docker' prefix).
 * @returns Docker command result; non-zero exits are returned, not thrown, unless `check` is set.
 * @throws DockerNotFoundError if docker command is not found.
 * @throws DockerTimeoutError if command times out.
 */
export async function safeDockerRun(args: string[], options: DockerRunOptions = {}): Promise<DockerResult> {
  const timeout = options.timeout ?? DOCKER_COMMAND_TIMEOUT;

  let result: DockerResult;
  try {
    const output = await execa("docker", args, {
      timeout,
      env: getDockerEnv(),
      ...(options.input === undefined ? {} : { input: options.input }),
    });
    result = { exitCode: output.exitCode ?? 0, stdout: output.stdout, stderr: output.stderr };
  } catch (error: unknown) {
    result = failureToResult(error, args, timeout);
  }
  return checked(result, args, options.check);
}

/**
 * Run a Docker command, handing every output line (stdout and stderr
 * interleaved) to `onLine` as it arrives.
 *
 * @returns Exit code; stdout/stderr are not retained.
 */
export async function streamDockerRun(
  args: string[],
  onLine: (line: string) => void,
  options: Omit<DockerRunOptions, "input"> = {}
): Promise<DockerResult> {
  const timeout = options.timeout ?? DOCKER_COMMAND_TIMEOUT;
  const subprocess = execa("docker", args, {
    timeout,
    env: getDockerEnv(),
    all: true,
    buffer: false,
  });

  let result: DockerResult;
  try {
    for await (const line of subprocess.iterable({ from: "all" })) {
      onLine(line);
    }
    const output = await subprocess;
    result = { exitCode: output.exitCode ?? 0, stdout: "", stderr: "" };
  } catch (error: unknown) {
    result = { ...failureToResult(error, args, timeout), stdout: "", stderr: "" };
  }
  return checked(result, args, options.check);
}

/**
 * Check if Docker daemon is responsive.
 *
 * @returns True if Docker is running and responsive, false otherwise.
 */
export async function checkDockerStatus(): Promise<boolean> {
  try {
    const result = await safeDockerRun(["info"]);
    return result.exitCode === 0;
  } catch {
    return false;
  }
}
