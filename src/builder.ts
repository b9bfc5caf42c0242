/**
 * Orchestration of a tree of images: scan a directory, then build, verify,
 * publish, prune or update the images found, respecting their dependencies.
 *
 * One DockerBuilder is created per invocation. build(), publish() and
 * prune() are async generators yielding each image once it has been
 * handled, so callers can report progress as it happens. The images are
 * processed one at a time; only scanning runs concurrently.
 *
 * Dependency direction:
 *   This module imports from: config, docker, errors, graph, http, image, image-record, label, logger, scanner, version
 *   It should NOT import from: cli, commands
 */

import { isAbsolute, join } from "node:path";

import { canPublish, type ImageTreeConfig } from "./config.js";
import { createDriver, type Driver, type DriverFactory } from "./docker/driver.js";
import { ValidationError, VersionFormatError, extractErrorDetails } from "./errors.js";
import { buildChain, buildChildren, descendants, pruneChain } from "./graph.js";
import { RegistryClient } from "./http/registry-client.js";
import { ContainerImage } from "./image.js";
import { ImageRecord, ImageState, NameRegistry, isImageState } from "./image-record.js";
import { ImageLabel } from "./label.js";
import { log } from "./logger.js";
import { findImageDirectories, scanImages } from "./scanner.js";
import { RELEASE_MODE, type BuildMode } from "./version.js";

export interface DockerBuilderOptions {
  /** Glob over full labels restricting which images are handled */
  selection?: string | null;
  /** Build without the layer cache (default true) */
  nocache?: boolean;
  /** Use images from the registry instead of rebuilding them (default true) */
  pull?: boolean;
  buildMode?: BuildMode;
  driverFactory?: DriverFactory;
  registryClient?: RegistryClient;
}

export interface PruneResult {
  record: ImageRecord;
  ok: boolean;
}

export interface UpdateResult {
  record: ImageRecord;
  /** New version written to the changelog, or null if the update failed */
  version: string | null;
  error?: Error;
}

function byShortName(a: ImageRecord, b: ImageRecord): number {
  return a.shortName < b.shortName ? -1 : a.shortName > b.shortName ? 1 : 0;
}

export class DockerBuilder {
  readonly root: string;
  readonly config: ImageTreeConfig;
  readonly selection: string | null;
  readonly nocache: boolean;
  readonly pull: boolean;
  readonly buildMode: BuildMode;
  /** Full labels templates can refer to: base images plus every scanned image */
  readonly knownImages: Set<string>;
  /** Scanned images by short name */
  readonly allImages = new Map<string, ImageRecord>();

  private readonly names = new NameRegistry();
  private readonly driverFactory: DriverFactory;
  private readonly registry: RegistryClient;
  /** Driver not bound to any image, used for pulling by reference */
  private readonly pullDriver: Driver;

  constructor(directory: string, config: ImageTreeConfig, options: DockerBuilderOptions = {}) {
    this.root = isAbsolute(directory) ? directory : join(process.cwd(), directory);
    this.config = config;
    this.selection = options.selection ?? null;
    this.nocache = options.nocache ?? true;
    this.buildMode = options.buildMode ?? RELEASE_MODE;
    this.driverFactory = options.driverFactory ?? createDriver;
    this.registry = options.registryClient ?? new RegistryClient(config);

    // Never try to pull our own images from a public registry
    const pull = options.pull ?? true;
    if (!config.registry) {
      if (pull) {
        log.warn("Not pulling images remotely as no registry is defined.");
      }
      this.pull = false;
    } else {
      this.pull = pull;
    }

    this.knownImages = new Set(config.baseImages);
    this.pullDriver = this.driverFactory(config, ImageLabel.fromConfig(config, "", ""), { nocache: this.nocache });
  }

  /**
   * Find and load every image under the root directory.
   *
   * @throws ScanError if any image fails to load; no image is added then.
   */
  async scan(maxWorkers: number = this.config.scanWorkers): Promise<void> {
    const directories = await findImageDirectories(this.root);
    const records = await scanImages(directories, (directory) => this.loadRecord(directory), maxWorkers);
    for (const record of records) {
      this.knownImages.add(record.label.full);
      this.allImages.set(record.shortName, record);
    }
  }

  private async loadRecord(directory: string): Promise<ImageRecord> {
    const image = await ContainerImage.load(directory, {
      config: this.config,
      knownImages: this.knownImages,
      nocache: this.nocache,
      buildMode: this.buildMode,
      driverFactory: this.driverFactory,
    });
    return ImageRecord.create(image, { registry: this.registry, names: this.names, pull: this.pull });
  }

  /**
   * Add an already created record, as scan() does.
   *
   * @throws DuplicateImageError if its short name is taken.
   */
  addImage(record: ImageRecord): void {
    this.names.claim(record.shortName);
    this.knownImages.add(record.label.full);
    this.allImages.set(record.shortName, record);
  }

  /** Records sorted by short name. */
  get images(): ImageRecord[] {
    return [...this.allImages.values()].sort(byShortName);
  }

  /**
   * @throws ValidationError for a string that is not a state.
   */
  imagesInState(state: string): ImageRecord[] {
    if (!isImageState(state)) {
      throw new ValidationError(`Invalid state ${state}`);
    }
    return this.images.filter((record) => record.state === state);
  }

  buildChain(): ImageRecord[] {
    return buildChain(this.allImages, this.selection);
  }

  pruneChain(): ImageRecord[] {
    return pruneChain(this.allImages, this.selection);
  }

  /**
   * The selected images plus every image depending on them, transitively.
   * Refreshes each record's `children`.
   *
   * @throws MissingDependencyError if any dependency was not scanned.
   */
  imagesToUpdate(): ImageRecord[] {
    const children = buildChildren(this.allImages);
    for (const record of this.allImages.values()) {
      record.children = children.get(record.shortName) ?? new Set();
    }
    return descendants(this.allImages, this.selection);
  }

  /** Pull the configured base images; a failure is only reported. */
  async pullBaseImages(): Promise<void> {
    for (const reference of this.config.baseImages) {
      log.info(`Pulling base image ${reference}`);
      try {
        if (!(await this.pullDriver.pull(reference))) {
          log.warn(`Could not pull base image ${reference}`);
        }
      } catch (error: unknown) {
        log.warn(`Could not pull base image ${reference}: ${extractErrorDetails(error)}`);
      }
    }
  }

  /**
   * Pull the published dependencies of an image before building it. If one
   * cannot be pulled the image is marked as failed.
   */
  async pullDependencies(record: ImageRecord): Promise<void> {
    for (const name of record.dependencies) {
      const dependency = this.allImages.get(name);
      if (dependency === undefined || dependency.state !== ImageState.PUBLISHED) {
        continue;
      }
      log.info(`Pulling ${dependency.label.full} for ${record.label.full}`);
      let pulled: boolean;
      try {
        pulled = await this.pullDriver.pull(dependency.label.full);
      } catch (error: unknown) {
        log.error(`Pulling ${dependency.label.full} failed: ${extractErrorDetails(error)}`);
        pulled = false;
      }
      if (!pulled) {
        log.error(`Could not pull dependency ${dependency.label.full} of ${record.label.full}`);
        record.state = ImageState.ERROR;
        return;
      }
    }
  }

  /**
   * Build, then verify, every image of the build chain.
   */
  async *build(): AsyncGenerator<ImageRecord> {
    if (this.pull) {
      await this.pullBaseImages();
    }
    for (const record of this.buildChain()) {
      if (this.pull) {
        await this.pullDependencies(record);
      }
      if (record.state === ImageState.TO_BUILD) {
        await record.build();
        if (record.state === ImageState.BUILT) {
          await record.verify();
        }
      }
      yield record;
    }
  }

  /**
   * Verify every image that is built but unverified, then publish every
   * verified image. Each candidate is yielded once the publish pass reaches
   * it, including those that failed verification. Yields nothing when there
   * is no registry or no credentials.
   */
  async *publish(): AsyncGenerator<ImageRecord> {
    if (!this.config.registry) {
      log.warn("Cannot publish if no registry is defined");
      return;
    }
    if (!canPublish(this.config)) {
      log.warn("Cannot publish images if both username and password are not set");
      return;
    }
    const candidates = this.images.filter(
      (record) => record.state === ImageState.BUILT || record.state === ImageState.VERIFIED
    );
    for (const record of candidates) {
      if (record.state === ImageState.BUILT) {
        await record.verify();
      }
    }
    for (const record of candidates) {
      if (record.state === ImageState.VERIFIED) {
        await record.publish();
      }
      yield record;
    }
  }

  /**
   * Remove stale local versions of the selected images, dependents first.
   */
  async *prune(): AsyncGenerator<PruneResult> {
    for (const record of this.pruneChain()) {
      yield { record, ok: await record.prune() };
    }
  }

  /**
   * Add a changelog entry to every image in `toUpdate`.
   *
   * The image named `baseName` gets `version` when one is given; every
   * other image gets the next version computed from its changelog. An image
   * whose version cannot be bumped is reported and skipped.
   */
  async updateImages(
    toUpdate: readonly ImageRecord[],
    reason: string,
    baseName: string,
    version?: string
  ): Promise<UpdateResult[]> {
    const results: UpdateResult[] = [];
    for (const record of toUpdate) {
      const isBase = record.shortName === baseName;
      try {
        const written = isBase
          ? await record.image.createUpdate(reason, version)
          : await record.image.createUpdate(`Dependency ${baseName} updated: ${reason}`);
        results.push({ record, version: written });
      } catch (error: unknown) {
        if (!(error instanceof VersionFormatError)) {
          throw error;
        }
        log.error(`Cannot update ${record.shortName}: ${extractErrorDetails(error)}`);
        results.push({ record, version: null, error });
      }
    }
    return results;
  }
}
