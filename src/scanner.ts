/**
 * Discovery of image directories.
 *
 * An image directory holds both Dockerfile.template and changelog. Loading
 * the images found is I/O bound (changelog reads, engine and registry
 * queries) and runs on a fixed-width worker pool.
 */

import { readdir } from "node:fs/promises";
import { join } from "node:path";

import { CHANGELOG_FILE, DEFAULT_SCAN_WORKERS, TEMPLATE_FILE } from "./constants.js";
import { ScanError } from "./errors.js";
import { log } from "./logger.js";
import { mapWithPool } from "./utils/pool.js";

/**
 * Every directory under `root` (itself included) that defines an image,
 * sorted. Directories with only one of the two required files are reported
 * and skipped.
 */
export async function findImageDirectories(root: string): Promise<string[]> {
  const found: string[] = [];

  const walk = async (directory: string): Promise<void> => {
    const entries = await readdir(directory, { withFileTypes: true });
    const files = new Set(entries.filter((entry) => entry.isFile()).map((entry) => entry.name));
    const hasTemplate = files.has(TEMPLATE_FILE);
    const hasChangelog = files.has(CHANGELOG_FILE);

    if (hasTemplate && hasChangelog) {
      found.push(directory);
    } else if (hasTemplate) {
      log.warn(`Ignoring ${directory} since it lacks a changelog`);
    } else if (hasChangelog) {
      log.warn(`Ignoring ${directory} since it lacks a ${TEMPLATE_FILE}`);
    }

    const subdirectories = entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();
    for (const name of subdirectories) {
      await walk(join(directory, name));
    }
  };

  await walk(root);
  return found.sort();
}

/**
 * Load every directory with `load`, at most `workers` at a time.
 *
 * @throws ScanError naming the first directory that failed; nothing is
 *   returned for a partial scan.
 */
export async function scanImages<T>(
  directories: readonly string[],
  load: (directory: string) => Promise<T>,
  workers: number = DEFAULT_SCAN_WORKERS
): Promise<T[]> {
  return mapWithPool(directories, workers, async (directory) => {
    log.info(`Processing the dockerfile template in ${directory}`);
    try {
      return await load(directory);
    } catch (error: unknown) {
      const scanError = new ScanError(directory, error);
      log.error(scanError.message);
      throw scanError;
    }
  });
}
