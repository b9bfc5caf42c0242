/**
 * Container engine access for imagetree.
 *
 * Facade module that re-exports from specialized sub-modules:
 * - executor.ts: Command execution (safeDockerRun, streamDockerRun, checkDockerStatus)
 * - driver.ts: The Driver interface and its factory
 * - cli-driver.ts: Driver implementation on top of the docker CLI
 */

// Executor
export {
  type DockerResult,
  type DockerRunOptions,
  safeDockerRun,
  streamDockerRun,
  checkDockerStatus,
  getDockerEnv,
} from "./executor.js";

// Driver
export { type Driver, type DriverFactory, type DriverOptions, createDriver } from "./driver.js";

// Docker CLI driver
export { DockerCliDriver, parseImageList, proxyBuildArgs } from "./cli-driver.js";
