/**
 * High-level management of one image directory.
 *
 * A ContainerImage reads its metadata from the directory (changelog and
 * control), renders Dockerfile.template, prepares a throwaway build context
 * and drives the build, artifact extraction and verification through its
 * Driver.
 *
 * If a Dockerfile.build.template is present, a helper image is built first
 * and the contents of its /build directory are copied into the context.
 *
 * Dependency direction:
 *   This module imports from: changelog, config, constants, docker, errors, label, logger, template, version
 *   It should NOT import from: image-record, builder, cli, commands
 */

import { existsSync } from "node:fs";
import { cp, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, isAbsolute, join, relative } from "node:path";

import { execa, ExecaError } from "execa";

import {
  currentEntry,
  getAuthor,
  makeUpdateEntry,
  parseControl,
  prependChangelogEntry,
} from "./changelog.js";
import type { ImageTreeConfig } from "./config.js";
import {
  ARTIFACTS_PATH,
  BUILD_TEMPLATE_FILE,
  CHANGELOG_FILE,
  CONTROL_FILE,
  DOCKERIGNORE_FILE,
  TEMPLATE_FILE,
  VERIFY_TIMEOUT,
} from "./constants.js";
import { createDriver, type Driver, type DriverFactory } from "./docker/driver.js";
import { DockerError, ImageBuildError, ImageTreeError, extractErrorDetails } from "./errors.js";
import { ImageLabel } from "./label.js";
import { log } from "./logger.js";
import { hasNumericUser, TemplateEngine } from "./template.js";
import { fnmatch } from "./utils/fnmatch.js";
import { applyBuildMode, newTag, RELEASE_MODE, type BuildMode } from "./version.js";

/** What an image directory declares about itself. */
export interface ImageMetadata {
  /** Package name of the current changelog entry */
  name: string;
  /** Version of the current changelog entry, before any build-mode suffix */
  version: string;
  /** Short names of the images this one builds on */
  dependencies: string[];
}

export interface ContainerImageOptions {
  config: ImageTreeConfig;
  /** Full labels of every image templates may reference */
  knownImages: ReadonlySet<string>;
  nocache?: boolean;
  buildMode?: BuildMode;
  driverFactory?: DriverFactory;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Read name, version and dependencies from an image directory.
 */
export async function readMetadata(directory: string): Promise<ImageMetadata> {
  const changelog = currentEntry(await readFile(join(directory, CHANGELOG_FILE), "utf-8"));

  let dependencies: string[] = [];
  try {
    dependencies = parseControl(await readFile(join(directory, CONTROL_FILE), "utf-8"));
  } catch (error: unknown) {
    // No control file: the image has no dependencies
    if (!isMissingFile(error)) {
      throw error;
    }
  }
  return { name: changelog.package, version: changelog.version, dependencies };
}

/**
 * Patterns of a .dockerignore file; `#` lines and blank lines are skipped.
 */
export function parseDockerignore(content: string): string[] {
  return content
    .split("\n")
    .filter((line) => !line.startsWith("#"))
    .map((line) => line.trim().replace(/^\/+|\/+$/g, ""))
    .filter(Boolean);
}

export class ContainerImage {
  readonly path: string;
  readonly metadata: ImageMetadata;
  readonly label: ImageLabel;
  readonly driver: Driver;
  /** Driver for the `<short>-build` helper image, when the directory has a build template */
  readonly buildDriver: Driver | null;
  private readonly config: ImageTreeConfig;
  private readonly templates: TemplateEngine;

  constructor(directory: string, metadata: ImageMetadata, options: ContainerImageOptions) {
    const factory = options.driverFactory ?? createDriver;
    const driverOptions = { nocache: options.nocache ?? true };

    this.path = directory;
    this.metadata = metadata;
    this.config = options.config;
    this.label = ImageLabel.fromConfig(
      options.config,
      metadata.name,
      applyBuildMode(metadata.version, options.buildMode ?? RELEASE_MODE)
    );
    this.driver = factory(options.config, this.label, driverOptions);
    this.templates = new TemplateEngine(directory, options.config, options.knownImages);

    if (existsSync(join(directory, BUILD_TEMPLATE_FILE))) {
      const helperLabel = ImageLabel.fromConfig(options.config, `${metadata.name}-build`, this.label.version);
      this.buildDriver = factory(options.config, helperLabel, driverOptions);
    } else {
      this.buildDriver = null;
    }
  }

  /**
   * Load the image defined in `directory`.
   */
  static async load(directory: string, options: ContainerImageOptions): Promise<ContainerImage> {
    return new ContainerImage(directory, await readMetadata(directory), options);
  }

  get shortName(): string {
    return this.label.shortName;
  }

  get dependencies(): string[] {
    return this.metadata.dependencies;
  }

  /** A filesystem-friendly identifier */
  get safeName(): string {
    return this.shortName.replace(/\//g, "-");
  }

  toString(): string {
    return this.label.full;
  }

  /**
   * Render a template of the image directory into Dockerfile text.
   *
   * @throws ImageBuildError if the output is empty, or if numeric users are
   *   enforced and the final USER is not numeric.
   */
  renderDockerfile(templateName: string = TEMPLATE_FILE): string {
    const dockerfile = this.templates.render(templateName);
    log.info(`Generated dockerfile for ${this.label.full}:\n${dockerfile}`);
    if (dockerfile.trim() === "") {
      throw new ImageBuildError("The generated dockerfile is empty");
    }
    if (this.config.forceNumericUser && !hasNumericUser(dockerfile)) {
      throw new ImageBuildError(`The image ${this.label.full} does not run as a numeric user`);
    }
    return dockerfile;
  }

  async writeDockerfile(contextDir: string, filename: string, templateName: string = TEMPLATE_FILE): Promise<void> {
    await writeFile(join(contextDir, filename), this.renderDockerfile(templateName), "utf-8");
  }

  /**
   * Build the image.
   *
   * @returns True if successful. Build failures are logged, not thrown.
   */
  async build(): Promise<boolean> {
    let success = false;
    let context: string | null = null;
    try {
      context = await this.createBuildEnvironment();
      if (await this.buildArtifacts(context)) {
        log.info(`${this.label.full} - building the image`);
        await this.writeDockerfile(context, "Dockerfile");
        await this.driver.doBuild(context, "Dockerfile");
        success = true;
      }
    } catch (error: unknown) {
      if (error instanceof DockerError) {
        log.error(`Building image ${this.label.full} failed - check your Dockerfile: ${error.message}`);
      } else {
        log.error(`Unexpected error building image ${this.label.full}: ${extractErrorDetails(error)}`);
      }
    } finally {
      if (context !== null) {
        await this.cleanBuildEnvironment(context);
      }
    }
    return success;
  }

  /**
   * Build the helper image and copy its artifacts into the context.
   *
   * @returns True if successful, or if there is no helper image.
   */
  private async buildArtifacts(context: string): Promise<boolean> {
    const helper = this.buildDriver;
    if (helper === null) {
      return true;
    }
    try {
      log.info(`${this.label.full} - building artifacts`);
      log.info(`${this.label.full} - creating the build image ${helper.label.full}`);
      await this.writeDockerfile(context, "Dockerfile.build", BUILD_TEMPLATE_FILE);
      await helper.doBuild(context, "Dockerfile.build");
      log.info(`${this.label.full} - extracting artifacts from the build image`);
      await helper.extract(ARTIFACTS_PATH, context);
      return true;
    } catch (error: unknown) {
      log.error(`Building artifacts for image ${this.label.full} failed: ${extractErrorDetails(error)}`);
      return false;
    } finally {
      await helper.clean();
    }
  }

  private async ignoreFilter(): Promise<(source: string) => boolean> {
    let patterns: string[] = [];
    try {
      patterns = parseDockerignore(await readFile(join(this.path, DOCKERIGNORE_FILE), "utf-8"));
    } catch (error: unknown) {
      if (!isMissingFile(error)) {
        throw error;
      }
    }
    return (source: string) => {
      const rel = relative(this.path, source);
      return rel === "" || !patterns.some((pattern) => fnmatch(rel, pattern, { pathname: true }));
    };
  }

  /**
   * Copy the image directory into a fresh temporary build context, leaving
   * out .dockerignore matches.
   *
   * @returns Path of the context directory.
   */
  async createBuildEnvironment(): Promise<string> {
    const base = await mkdtemp(join(tmpdir(), `imagetree-${this.safeName}-`));
    const context = join(base, "context");
    try {
      await cp(this.path, context, { recursive: true, filter: await this.ignoreFilter() });
    } catch (error: unknown) {
      await rm(base, { recursive: true, force: true });
      throw error;
    }
    return context;
  }

  async cleanBuildEnvironment(context: string): Promise<void> {
    const base = dirname(context);
    log.info(`Removing build context ${base}`);
    await rm(base, { recursive: true, force: true });
  }

  /**
   * Run the verification command against the built image.
   *
   * `{path}` and `{image}` in the configured arguments become the image
   * directory and full label. When an argument names a script inside the
   * image directory that does not exist, there is nothing to verify.
   */
  async verify(): Promise<boolean> {
    const args = this.config.verifyArgs.map((arg) =>
      arg.replaceAll("{path}", this.path).replaceAll("{image}", this.label.full)
    );

    const missing = args
      .flatMap((arg) => arg.split(/\s+/))
      .find((word) => isAbsolute(word) && word.startsWith(`${this.path}/`) && !existsSync(word));
    if (missing !== undefined) {
      log.info(`${this.label.full} - no verification script at ${missing}, skipping verification`);
      return true;
    }

    const imageLog = log.child(this.label.full);
    try {
      const result = await execa(this.config.verifyCommand, args, { timeout: VERIFY_TIMEOUT, all: true });
      for (const line of result.all.split("\n")) {
        if (line.trim()) {
          imageLog.info(line);
        }
      }
      return true;
    } catch (error: unknown) {
      if (error instanceof ExecaError && error.code === "ENOENT") {
        imageLog.error(`Verification command ${this.config.verifyCommand} not found`);
        return false;
      }
      imageLog.error(`Verification failed: ${extractErrorDetails(error)}`);
      return false;
    }
  }

  /** Next version for an update, from the changelog version. */
  newTag(identifier: string = this.config.updateId): string {
    return newTag(this.metadata.version, identifier);
  }

  /**
   * Prepend a changelog entry for an update to this image.
   *
   * @param version - Version of the entry; computed with newTag() when omitted.
   */
  async createUpdate(reason: string, version?: string): Promise<string> {
    const next = version ?? this.newTag();
    const [name, email] = await getAuthor(this.config);
    const entry = makeUpdateEntry(this.shortName, next, reason, this.config.distribution, `${name} <${email}>`);
    try {
      await prependChangelogEntry(join(this.path, CHANGELOG_FILE), entry);
    } catch (error: unknown) {
      throw new ImageTreeError(`Could not update the changelog of ${this.shortName}: ${extractErrorDetails(error)}`, {
        cause: error,
      });
    }
    log.info(`${this.shortName} - added changelog entry for version ${next}`);
    return next;
  }
}
