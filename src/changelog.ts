/**
 * Reading and writing image metadata: Debian-style changelog and control
 * files.
 *
 * Changelog entries look like:
 *
 *   foo-bar (0.0.1) stable; urgency=medium
 *
 *     * Initial release
 *
 *    -- Jane Doe <jane@example.org>  Mon, 2 Jan 2023 10:00:00 +0000
 *
 * The first entry is the current one; it gives the image name and version.
 */

import { readFile, writeFile } from "node:fs/promises";

import { format } from "date-fns";
import { execa } from "execa";

import type { ImageTreeConfig } from "./config.js";
import { MetadataError } from "./errors.js";
import { log } from "./logger.js";

export interface ChangelogEntry {
  package: string;
  version: string;
  distribution: string;
  urgency: string;
  /** Body lines, verbatim */
  changes: string[];
  /** `Name <email>` */
  author: string;
  date: string;
}

/** RFC 2822 date as written in changelog trailers. */
export const CHANGELOG_DATE_FORMAT = "EEE, d MMM yyyy HH:mm:ss xx";

const HEADER_RE = /^(\S+) \(([^()\s]+)\) ([^;]+);\s*urgency=(\w+)/;
const TRAILER_RE = /^ -- (.*?) {2}(.*)$/;

function trimBlankLines(lines: string[]): string[] {
  let start = 0;
  let end = lines.length;
  while (start < end && lines[start]?.trim() === "") {start++;}
  while (end > start && lines[end - 1]?.trim() === "") {end--;}
  return lines.slice(start, end);
}

/**
 * Parse all entries of a changelog, newest first.
 */
export function parseChangelog(text: string): ChangelogEntry[] {
  const entries: ChangelogEntry[] = [];
  let current: Omit<ChangelogEntry, "author" | "date"> | null = null;

  for (const [index, line] of text.split("\n").entries()) {
    if (current === null) {
      if (line.trim() === "") {
        continue;
      }
      const header = line.match(HEADER_RE);
      if (!header?.[1] || !header[2] || !header[3] || !header[4]) {
        throw new MetadataError(`Invalid changelog header at line ${index + 1}: ${line}`);
      }
      current = {
        package: header[1],
        version: header[2],
        distribution: header[3].trim(),
        urgency: header[4],
        changes: [],
      };
      continue;
    }

    const trailer = line.match(TRAILER_RE);
    if (trailer) {
      entries.push({
        ...current,
        changes: trimBlankLines(current.changes),
        author: trailer[1] ?? "",
        date: trailer[2] ?? "",
      });
      current = null;
      continue;
    }
    current.changes.push(line);
  }

  if (current !== null) {
    throw new MetadataError("Changelog entry is missing its trailer line");
  }
  return entries;
}

/**
 * First (current) entry of a changelog.
 */
export function currentEntry(text: string): ChangelogEntry {
  const [first] = parseChangelog(text);
  if (!first) {
    throw new MetadataError("Changelog has no entries");
  }
  return first;
}

export function formatChangelogDate(date: Date = new Date()): string {
  return format(date, CHANGELOG_DATE_FORMAT);
}

/**
 * Render one changelog block, followed by a blank separator line.
 */
export function formatChangelogEntry(entry: ChangelogEntry): string {
  const body = entry.changes.join("\n");
  return [
    `${entry.package} (${entry.version}) ${entry.distribution}; urgency=${entry.urgency}`,
    "",
    body,
    "",
    ` -- ${entry.author}  ${entry.date}`,
    "",
    "",
  ].join("\n");
}

/**
 * Build the entry for an update: urgency high, each reason line indented by
 * three spaces.
 */
export function makeUpdateEntry(
  packageName: string,
  version: string,
  reason: string,
  distribution: string,
  author: string,
  date: Date = new Date(),
): ChangelogEntry {
  return {
    package: packageName,
    version,
    distribution,
    urgency: "high",
    changes: reason.split("\n").map((line) => `   ${line}`),
    author,
    date: formatChangelogDate(date),
  };
}

/**
 * Prepend an entry to the changelog file at `path`.
 */
export async function prependChangelogEntry(path: string, entry: ChangelogEntry): Promise<void> {
  const existing = await readFile(path, "utf-8");
  await writeFile(path, formatChangelogEntry(entry) + existing, "utf-8");
}

// === control ===

const DEPENDENCY_FIELDS = ["Build-Depends", "Depends"];

/**
 * Parse deb822 paragraphs into field maps. Continuation lines (starting
 * with whitespace) are joined to the previous field with a newline.
 */
export function parseControlParagraphs(text: string): Map<string, string>[] {
  const paragraphs: Map<string, string>[] = [];
  let current = new Map<string, string>();
  let lastKey: string | null = null;

  for (const line of text.split("\n")) {
    if (line.trim() === "") {
      if (current.size > 0) {
        paragraphs.push(current);
        current = new Map();
      }
      lastKey = null;
      continue;
    }
    if (line.startsWith("#")) {
      continue;
    }
    if (/^\s/.test(line)) {
      if (lastKey === null) {
        throw new MetadataError(`Continuation line without a field in control file: ${line}`);
      }
      current.set(lastKey, `${current.get(lastKey) ?? ""}\n${line.trim()}`);
      continue;
    }
    const field = line.match(/^([^\s:]+):\s*(.*)$/);
    if (!field?.[1]) {
      throw new MetadataError(`Invalid line in control file: ${line}`);
    }
    lastKey = field[1];
    current.set(lastKey, field[2]?.trim() ?? "");
  }
  if (current.size > 0) {
    paragraphs.push(current);
  }
  return paragraphs;
}

/**
 * Names of the images a control file depends on, from the Build-Depends and
 * Depends fields of every paragraph. Version constraints are dropped.
 */
export function parseControl(text: string): string[] {
  const deps: string[] = [];
  for (const paragraph of parseControlParagraphs(text)) {
    for (const key of DEPENDENCY_FIELDS) {
      const value = paragraph.get(key);
      if (!value) {
        continue;
      }
      for (const item of value.split(/\s*,[\s\n]*/)) {
        const name = item.replace(/\s*\(.*\)\s*$/, "").trim();
        if (name) {
          deps.push(name);
        }
      }
    }
  }
  return deps;
}

// === author ===

async function gitConfig(key: string): Promise<string> {
  const { stdout } = await execa("git", ["config", "--get", key]);
  return stdout.trim();
}

/**
 * Author of an update, as `[name, email]`.
 *
 * DEBFULLNAME/DEBEMAIL win; otherwise git's user.name/user.email; otherwise
 * the configured fallbacks. If git has no user name, its email is not used
 * either.
 */
export async function getAuthor(
  config: Pick<ImageTreeConfig, "fallbackAuthor" | "fallbackEmail">,
  env: NodeJS.ProcessEnv = process.env,
): Promise<[string, string]> {
  let name = config.fallbackAuthor;
  let email = config.fallbackEmail;
  let gitFailed = false;

  if (env.DEBFULLNAME !== undefined) {
    name = env.DEBFULLNAME;
  } else {
    try {
      name = await gitConfig("user.name");
    } catch (e) {
      log.debug(`git user.name unavailable: ${String(e)}`);
      gitFailed = true;
    }
  }

  if (env.DEBEMAIL !== undefined) {
    email = env.DEBEMAIL;
  } else if (!gitFailed) {
    try {
      email = await gitConfig("user.email");
    } catch (e) {
      log.debug(`git user.email unavailable: ${String(e)}`);
    }
  }
  return [name, email];
}
