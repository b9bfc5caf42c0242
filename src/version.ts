/**
 * Version bumping and build modes.
 */

import { format } from "date-fns";

import { NIGHTLY_BUILD_FORMAT } from "./constants.js";
import { VersionFormatError } from "./errors.js";

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Compute the next version for a security/dependency update.
 *
 * The version is split into a numeric base and an optional `-{id}{n}`
 * sequence; the sequence is incremented (starting at 1).
 *
 *   newTag("0.1.2", "s")      -> "0.1.2-s1"
 *   newTag("0.1.2-1-s8", "s") -> "0.1.2-1-s9"
 *   newTag("0.1.2-1", "")     -> "0.1.2-2"
 */
export function newTag(version: string, identifier = "s"): string {
  const pattern = new RegExp(`^([\\d\\-\\.]+?)(-${escapeRegExp(identifier)}(\\d+))?$`);
  const match = version.match(pattern);
  if (!match?.[1]) {
    throw new VersionFormatError(version);
  }
  const base = match[1];
  const sequence = match[3] === undefined ? 0 : parseInt(match[3], 10);
  return `${base}-${identifier}${sequence + 1}`;
}

/** How versions are derived for a run. */
export type BuildMode =
  | { kind: "release" }
  | { kind: "nightly"; suffix: string };

export const RELEASE_MODE: BuildMode = { kind: "release" };

/**
 * Nightly suffix for a run, e.g. 20261019-164400. Computed once per run so
 * every image in the run shares it.
 */
export function nightlySuffix(date: Date = new Date()): string {
  return format(date, NIGHTLY_BUILD_FORMAT);
}

export function nightlyMode(suffix: string = nightlySuffix()): BuildMode {
  return { kind: "nightly", suffix };
}

/**
 * Version an image is built under in the given mode.
 */
export function applyBuildMode(version: string, mode: BuildMode): string {
  return mode.kind === "nightly" ? `${version}-${mode.suffix}` : version;
}
