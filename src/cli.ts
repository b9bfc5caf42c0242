/**
 * Command line interface for imagetree.
 *
 * Commander-based; global options come before the command:
 *   imagetree [-c FILE] [--debug | --info] build [--nightly] [--use-cache] [--no-pull] [--select GLOB] DIR
 *   imagetree [-c FILE] [--debug | --info] prune [--nightly SUFFIX] [--select GLOB] DIR
 *   imagetree [-c FILE] [--debug | --info] update NAME [--reason TEXT] [-v VERSION] DIR
 */

import { Command, Option } from "commander";

import { DockerBuilder, type DockerBuilderOptions } from "./builder.js";
import { runBuild } from "./commands/build.js";
import { runPrune } from "./commands/prune.js";
import { runUpdate, updateSelection } from "./commands/update.js";
import { loadConfig } from "./config-file.js";
import { DEFAULT_CONFIG_FILE, DEFAULT_LOG_FILE, TOOL_NAME, VERSION } from "./constants.js";
import { checkDockerStatus } from "./docker/executor.js";
import { DockerError } from "./errors.js";
import { ExitCode, exitCodeFor, logError } from "./error-handler.js";
import { LogLevel, setLogFile, setLogLevel } from "./logger.js";
import { nightlyMode, RELEASE_MODE } from "./version.js";

interface GlobalOptions {
  configfile: string;
  debug?: boolean;
  info?: boolean;
}

interface BuildCommandOptions {
  nightly?: boolean;
  useCache?: boolean;
  pull: boolean;
  select?: string;
}

interface PruneCommandOptions {
  nightly?: string;
  select?: string;
}

interface UpdateCommandFlags {
  reason: string;
  version?: string;
}

/**
 * Send diagnostics to the terminal with --debug/--info, to the log file
 * otherwise.
 */
function setupLogging(options: GlobalOptions): void {
  if (options.debug) {
    setLogLevel(LogLevel.DEBUG);
    setLogFile(null);
  } else if (options.info) {
    setLogLevel(LogLevel.INFO);
    setLogFile(null);
  } else {
    setLogLevel(LogLevel.INFO);
    setLogFile(DEFAULT_LOG_FILE);
  }
}

/**
 * Run a command body, turning whatever escapes it into an exit status.
 */
async function execute(operation: string, action: () => Promise<ExitCode>): Promise<void> {
  try {
    process.exitCode = await action();
  } catch (error: unknown) {
    logError(error, operation);
    process.exitCode = exitCodeFor(error);
  }
}

export function createProgram(): Command {
  const program = new Command();

  // A configuration file named explicitly must exist; the default one may not
  const makeBuilder = (directory: string, options: DockerBuilderOptions): DockerBuilder => {
    const globals = program.opts<GlobalOptions>();
    const config = loadConfig(globals.configfile, {
      required: program.getOptionValueSource("configfile") === "cli",
    });
    return new DockerBuilder(directory, config, options);
  };

  program
    .name(TOOL_NAME)
    .description("Build, verify, publish and prune a tree of container images")
    .version(VERSION)
    .enablePositionalOptions()
    .option("-c, --configfile <file>", "Configuration file", DEFAULT_CONFIG_FILE)
    .addOption(new Option("--debug", "Log debug messages to the terminal").conflicts("info"))
    .addOption(new Option("--info", "Log info messages to the terminal"))
    .hook("preAction", (thisCommand) => {
      setupLogging(thisCommand.opts<GlobalOptions>());
    });

  program
    .command("build")
    .description("Build images (and publish them to the registry)")
    .argument("<directory>", "The directory to scan for images")
    .option("--nightly", "Prepare a nightly build")
    .option("--use-cache", "Use the Docker cache when building the images")
    .option("--no-pull", "Do not attempt to pull published images instead of building them")
    .option("--select <glob>", "Glob over name:tag restricting the images to build")
    .action(async (directory: string, options: BuildCommandOptions) => {
      await execute("build images", async () => {
        const builder = makeBuilder(directory, {
          selection: options.select ?? null,
          nocache: !options.useCache,
          pull: options.pull,
          buildMode: options.nightly ? nightlyMode() : RELEASE_MODE,
        });
        if (builder.config.driver === "docker" && !(await checkDockerStatus())) {
          throw new DockerError("Docker is not running.");
        }
        return runBuild(builder);
      });
    });

  program
    .command("prune")
    .description("Prune local outdated versions of the images in DIRECTORY")
    .argument("<directory>", "The directory to scan for images")
    .option("--select <glob>", "Glob over name:tag restricting the images to prune")
    .option("--nightly <suffix>", "Keep only the nightly build with this suffix")
    .action(async (directory: string, options: PruneCommandOptions) => {
      await execute("prune images", async () => {
        const builder = makeBuilder(directory, {
          selection: options.select ?? null,
          nocache: true,
          pull: false,
          buildMode: options.nightly === undefined ? RELEASE_MODE : nightlyMode(options.nightly),
        });
        return runPrune(builder);
      });
    });

  program
    .command("update")
    .description("Prepare an update of an image and of every image depending on it")
    .argument("<name>", "Short name of the image being updated")
    .argument("<directory>", "The directory to scan for images")
    .option("--reason <text>", "Reason for the update", "Security update")
    .option("-v, --version <version>", "Version for the updated image")
    .action(async (name: string, directory: string, options: UpdateCommandFlags) => {
      await execute("update images", async () => {
        const builder = makeBuilder(directory, {
          selection: updateSelection(name),
          nocache: true,
          pull: false,
        });
        return runUpdate(builder, { name, reason: options.reason, version: options.version });
      });
    });

  return program;
}

export async function main(argv: readonly string[] = process.argv): Promise<void> {
  await createProgram().parseAsync([...argv]);
}
