/**
 * Lifecycle of one image within a run.
 *
 *   TO_BUILD --build()--> BUILT --verify()--> VERIFIED --publish()--> PUBLISHED
 *       \                   \                    \
 *        `-------------------`--------------------`--> ERROR
 *
 * The initial state is decided once, when the record is created, by asking
 * the registry and the local engine whether the image already exists.
 */

import { LATEST_TAG } from "./constants.js";
import { DuplicateImageError, InvalidTransitionError, extractErrorDetails } from "./errors.js";
import type { RegistryClient } from "./http/registry-client.js";
import type { ContainerImage } from "./image.js";
import type { ImageLabel } from "./label.js";
import { log } from "./logger.js";

export enum ImageState {
  /** Image could not be found in the registry or locally */
  TO_BUILD = "to_build",
  /** Image is present locally */
  BUILT = "built",
  /** Image is present locally and passed verification */
  VERIFIED = "verified",
  /** Image is in the target registry */
  PUBLISHED = "published",
  /** A build, verification or publish failed */
  ERROR = "error",
}

export const IMAGE_STATES: readonly ImageState[] = Object.values(ImageState);

export function isImageState(value: string): value is ImageState {
  return IMAGE_STATES.some((state) => state === value);
}

/**
 * Short names registered during a scan. A name can be claimed once.
 *
 * claim() checks and inserts without yielding, so concurrent scan tasks
 * cannot both claim the same name.
 */
export class NameRegistry {
  private readonly names = new Set<string>();

  claim(shortName: string): void {
    if (this.names.has(shortName)) {
      throw new DuplicateImageError(shortName);
    }
    this.names.add(shortName);
  }

  has(shortName: string): boolean {
    return this.names.has(shortName);
  }

  get size(): number {
    return this.names.size;
  }
}

export interface ImageRecordOptions {
  registry: RegistryClient;
  names: NameRegistry;
  /** Whether images may come from the registry instead of being built */
  pull: boolean;
}

/**
 * Decide where an image stands before anything is done to it.
 *
 * When pulling is allowed a published image never needs building. When it
 * is not, anything missing locally has to be built.
 */
async function initialState(image: ContainerImage, registry: RegistryClient, pull: boolean): Promise<ImageState> {
  if (pull) {
    if (await registry.isPublished(image.label)) {
      return ImageState.PUBLISHED;
    }
    return (await image.driver.exists()) ? ImageState.BUILT : ImageState.TO_BUILD;
  }
  if (!(await image.driver.exists())) {
    return ImageState.TO_BUILD;
  }
  return (await registry.isPublished(image.label)) ? ImageState.PUBLISHED : ImageState.BUILT;
}

export class ImageRecord {
  readonly image: ContainerImage;
  state: ImageState;
  /** Short names of the images declaring this one as a dependency */
  children = new Set<string>();

  constructor(image: ContainerImage, state: ImageState) {
    this.image = image;
    this.state = state;
  }

  /**
   * Register the image's short name and compute its initial state.
   *
   * @throws DuplicateImageError if the short name is already registered.
   */
  static async create(image: ContainerImage, options: ImageRecordOptions): Promise<ImageRecord> {
    options.names.claim(image.shortName);
    return new ImageRecord(image, await initialState(image, options.registry, options.pull));
  }

  get shortName(): string {
    return this.image.shortName;
  }

  get label(): ImageLabel {
    return this.image.label;
  }

  get version(): string {
    return this.image.label.version;
  }

  get dependencies(): readonly string[] {
    return this.image.dependencies;
  }

  toString(): string {
    return `ImageRecord(${this.label.full}, ${this.state})`;
  }

  async build(): Promise<void> {
    if (this.state === ImageState.BUILT) {
      return;
    }
    if (this.state !== ImageState.TO_BUILD) {
      throw new InvalidTransitionError(`Image ${this.label.full} is already built or failed to build`);
    }
    if (!(await this.image.build())) {
      this.state = ImageState.ERROR;
      return;
    }
    try {
      log.debug(`Adding tag ${LATEST_TAG} to image ${this.label.full}`);
      await this.image.driver.addTag(this.label, LATEST_TAG);
      this.state = ImageState.BUILT;
    } catch (error: unknown) {
      log.error(`Could not tag ${this.label.full} as ${LATEST_TAG}: ${extractErrorDetails(error)}`);
      this.state = ImageState.ERROR;
    }
  }

  async verify(): Promise<void> {
    if (this.state === ImageState.VERIFIED) {
      return;
    }
    if (this.state !== ImageState.BUILT) {
      throw new InvalidTransitionError(`Image ${this.label.full} is not built, cannot verify it`);
    }
    this.state = (await this.image.verify()) ? ImageState.VERIFIED : ImageState.ERROR;
  }

  async publish(): Promise<void> {
    if (this.state !== ImageState.VERIFIED) {
      throw new InvalidTransitionError(`Image ${this.label.full} is not verified, cannot publish it!`);
    }
    try {
      const published = await this.image.driver.publish([this.version, LATEST_TAG]);
      this.state = published ? ImageState.PUBLISHED : ImageState.ERROR;
    } catch (error: unknown) {
      log.error(`Publishing ${this.label.full} failed: ${extractErrorDetails(error)}`);
      this.state = ImageState.ERROR;
    }
  }

  /** Remove stale local versions of the image. False if that failed. */
  async prune(): Promise<boolean> {
    try {
      return await this.image.driver.prune();
    } catch (error: unknown) {
      log.error(`Pruning ${this.label.full} failed: ${extractErrorDetails(error)}`);
      return false;
    }
  }
}
