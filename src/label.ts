/**
 * Image labels: the registry/namespace/short-name/version quadruple that
 * identifies one image, and its string projections.
 */

import type { ImageTreeConfig } from "./config.js";

export class ImageLabel {
  readonly registry: string | null;
  readonly namespace: string | null;
  readonly shortName: string;
  readonly version: string;

  constructor(registry: string | null, namespace: string | null, shortName: string, version: string) {
    this.registry = registry;
    this.namespace = namespace;
    this.shortName = shortName;
    this.version = version;
  }

  static fromConfig(config: Pick<ImageTreeConfig, "registry" | "namespace">, shortName: string, version: string): ImageLabel {
    return new ImageLabel(config.registry, config.namespace, shortName, version);
  }

  get short(): string {
    return this.shortName;
  }

  /** `registry/namespace/short`, empty segments omitted. */
  get name(): string {
    return [this.registry, this.namespace, this.shortName].filter((part): part is string => Boolean(part)).join("/");
  }

  /** `name:version` */
  get full(): string {
    return `${this.name}:${this.version}`;
  }

  withVersion(version: string): ImageLabel {
    return new ImageLabel(this.registry, this.namespace, this.shortName, version);
  }

  toString(): string {
    return this.full;
  }
}
