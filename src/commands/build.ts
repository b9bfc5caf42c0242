/**
 * The `build` command: scan, build and verify, then publish.
 *
 * Dependency direction:
 *   This module imports from: builder, config, constants, error-handler, image-record, logger
 *   It should NOT import from: cli
 */

import type { DockerBuilder } from "../builder.js";
import { canPublish } from "../config.js";
import { ExitCode } from "../error-handler.js";
import { ImageState } from "../image-record.js";
import { getLogFile, log } from "../logger.js";

/**
 * Run a full build of the tree handled by `builder`.
 *
 * Images failing to build or publish are reported; they do not change the
 * exit status.
 */
export async function runBuild(builder: DockerBuilder): Promise<ExitCode> {
  log.bold(`== Step 0: scanning ${builder.root} ==`);
  await builder.scan();
  log.raw("Will build the following images:");
  for (const record of builder.buildChain()) {
    log.raw(`* ${record.label.full}`);
  }

  log.bold("== Step 1: building images ==");
  for await (const record of builder.build()) {
    if (record.state === ImageState.ERROR) {
      log.red(` ERROR: image ${record.label.name} failed to build, see logs for details`);
    } else if (record.state === ImageState.VERIFIED) {
      log.raw(`=> Built image ${record.label.full}`);
    }
  }

  log.bold("== Step 2: publishing ==");
  if (!canPublish(builder.config)) {
    log.yellow("NOT publishing images as we have no auth setup");
  } else {
    for await (const record of builder.publish()) {
      if (record.state === ImageState.PUBLISHED) {
        log.success(`Successfully published image ${record.label.name}`);
      } else {
        log.red(` ERROR: image ${record.label.name} could not be published, see logs for details`);
      }
    }
  }

  log.bold("== Build done! ==");
  const logFile = getLogFile();
  if (logFile !== null) {
    log.dim(`You can see the logs at ${logFile}`);
  }
  return ExitCode.SUCCESS;
}
