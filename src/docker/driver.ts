/**
 * Container engine driver abstraction.
 *
 * A driver is bound to one image label and performs the engine-side
 * operations for it. Everything above this layer (ContainerImage,
 * ImageRecord, DockerBuilder) talks to the engine only through Driver.
 *
 * Dependency direction:
 *   This module imports from: config.ts, errors.ts, label.ts, cli-driver.ts
 *   It should NOT import from: image, image-record, builder, cli
 */

import type { ImageTreeConfig } from "../config.js";
import { ConfigError } from "../errors.js";
import type { ImageLabel } from "../label.js";
import { DockerCliDriver } from "./cli-driver.js";

export interface Driver {
  readonly label: ImageLabel;

  /** True if the image is present locally. */
  exists(): Promise<boolean>;

  /**
   * Build the image from a context directory holding `filename`.
   *
   * @returns The full label of the built image.
   * @throws ImageBuildError when the build fails.
   */
  doBuild(contextDir: string, filename?: string): Promise<string>;

  /** Push each tag of the image's name; false on the first failure. */
  publish(tags: string[]): Promise<boolean>;

  /** Remove local images of this name not tagged with the current version. */
  prune(): Promise<boolean>;

  /** Tag `label` additionally as `label.name:tag`. */
  addTag(label: ImageLabel, tag: string): Promise<void>;

  /** Remove the image; an image that does not exist is not an error. */
  clean(): Promise<void>;

  /** Pull a full reference from its registry; false on failure. */
  pull(reference: string): Promise<boolean>;

  /**
   * Copy `src` out of the image into the host directory `dst`.
   *
   * @throws ImageBuildError when the copy fails.
   */
  extract(src: string, dst: string): Promise<void>;
}

export interface DriverOptions {
  /** Build without the layer cache */
  nocache: boolean;
}

export type DriverFactory = (config: ImageTreeConfig, label: ImageLabel, options: DriverOptions) => Driver;

/**
 * Driver for `config.driver`.
 *
 * @throws ConfigError for an unknown driver name.
 */
export const createDriver: DriverFactory = (config, label, options) => {
  switch (config.driver) {
    case "docker":
      return new DockerCliDriver(config, label, options);
    default:
      throw new ConfigError(`Driver ${config.driver} not supported`);
  }
};
