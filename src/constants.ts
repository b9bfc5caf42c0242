/**
 * Constants module for imagetree.
 *
 * All timeout values and shared names are defined here.
 */

import { readFileSync } from "node:fs";

// === Version (read from package.json, one level above src/ and dist/) ===
function readVersion(): string {
  try {
    const raw: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
    if (raw && typeof raw === "object" && "version" in raw && typeof raw.version === "string") {
      return raw.version;
    }
  } catch {
    // Fall through to the placeholder below
  }
  return "0.0.0";
}

export const VERSION: string = readVersion();

export const TOOL_NAME = "imagetree";

// === Image directory layout ===
export const TEMPLATE_FILE = "Dockerfile.template";
export const BUILD_TEMPLATE_FILE = "Dockerfile.build.template";
export const CHANGELOG_FILE = "changelog";
export const CONTROL_FILE = "control";
export const DOCKERIGNORE_FILE = ".dockerignore";
/** Path inside a build-helper image whose contents become build artifacts */
export const ARTIFACTS_PATH = "/build";

// === Docker Timeouts (milliseconds) ===
export const DOCKER_COMMAND_TIMEOUT = 30_000; // Quick docker commands (inspect, tag, rmi)
export const DOCKER_BUILD_TIMEOUT = 3_600_000; // One hour per image build
export const DOCKER_TRANSFER_TIMEOUT = 1_800_000; // Pushes and pulls
export const VERIFY_TIMEOUT = 1_800_000; // Post-build verification script
export const REGISTRY_REQUEST_TIMEOUT = 15_000; // Manifest HEAD/GET against the registry

// === Scanning ===
export const DEFAULT_SCAN_WORKERS = 8;

// === Output ===
export const DEFAULT_LOG_FILE = "./imagetree-build.log";
export const DEFAULT_CONFIG_FILE = "config.yaml";

/** date-fns pattern for nightly version suffixes, e.g. 20261019-164400 */
export const NIGHTLY_BUILD_FORMAT = "yyyyMMdd-HHmmss";

/** Tag applied alongside the versioned tag on every publish */
export const LATEST_TAG = "latest";
