/**
 * The `update` command: add a changelog entry to an image and to every image
 * built on top of it.
 */

import type { DockerBuilder } from "../builder.js";
import { ExitCode } from "../error-handler.js";
import { log } from "../logger.js";

export interface UpdateCommandOptions {
  /** Short name of the image being updated */
  name: string;
  reason: string;
  /** Version for the named image; computed from its changelog when absent */
  version?: string;
}

/**
 * Selection for the labels whose short name ends with `name`, whatever the
 * version and registry. `foo` also selects `barfoo:1.0`.
 */
export function updateSelection(name: string): string {
  return `*${name}:*`;
}

/**
 * @returns PARTIAL_FAILURE when any image could not get a new version.
 */
export async function runUpdate(builder: DockerBuilder, options: UpdateCommandOptions): Promise<ExitCode> {
  log.bold(`== Step 0: scanning ${builder.root} ==`);
  await builder.scan();
  const toUpdate = builder.imagesToUpdate();
  if (toUpdate.length === 0) {
    log.yellow(`No image matches ${options.name}`);
    return ExitCode.SUCCESS;
  }
  log.raw("Will update the following images:");
  for (const record of toUpdate) {
    log.raw(`* ${record.shortName}`);
  }

  log.bold("== Step 1: adding updates ==");
  const results = await builder.updateImages(toUpdate, options.reason, options.name, options.version);
  let failed = 0;
  for (const result of results) {
    if (result.version === null) {
      failed++;
      log.red(`* Could not update ${result.record.shortName}, see logs for details`);
    } else {
      log.raw(`* ${result.record.shortName} ${result.version}`);
    }
  }
  return failed > 0 ? ExitCode.PARTIAL_FAILURE : ExitCode.SUCCESS;
}
