/**
 * The `prune` command: drop outdated local versions of the selected images.
 */

import type { DockerBuilder } from "../builder.js";
import { ExitCode } from "../error-handler.js";
import { log } from "../logger.js";

export async function runPrune(builder: DockerBuilder): Promise<ExitCode> {
  log.bold(`== Step 0: scanning ${builder.root} ==`);
  await builder.scan();
  log.raw("Will prune old versions of the following images:");
  const chain = builder.pruneChain();
  for (const record of chain) {
    log.raw(`* ${record.label.full}`);
  }

  log.bold("== Step 1: pruning images ==");
  for await (const { record, ok } of builder.prune()) {
    if (!ok) {
      log.red(`* Errors pruning old images for ${record.label.full}`);
    }
  }
  return ExitCode.SUCCESS;
}
