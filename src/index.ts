/**
 * imagetree - Build, verify, publish and prune a tree of container images.
 *
 * This is the main entry point for the imagetree npm package.
 */

export { VERSION } from "./constants.js";
export { type ImageTreeConfig, DEFAULT_CONFIG, makeConfig, canPublish } from "./config.js";
export { loadConfig, loadConfigFile, mergeConfigs } from "./config-file.js";
export {
  ImageTreeError,
  ConfigError,
  ValidationError,
  DockerError,
  ImageBuildError,
  ScanError,
  DuplicateImageError,
  MetadataError,
  DependencyLoopError,
  MissingDependencyError,
  InvalidTransitionError,
  VersionFormatError,
} from "./errors.js";
export { ImageLabel } from "./label.js";
export { ContainerImage, type ContainerImageOptions, type ImageMetadata } from "./image.js";
export { ImageRecord, ImageState, NameRegistry } from "./image-record.js";
export { DockerBuilder, type DockerBuilderOptions, type PruneResult, type UpdateResult } from "./builder.js";
export { buildChain, pruneChain, buildChildren, descendants, type GraphNode } from "./graph.js";
export { type Driver, type DriverFactory, type DriverOptions, createDriver, DockerCliDriver } from "./docker/index.js";
export { RegistryClient } from "./http/registry-client.js";
export { newTag, nightlyMode, type BuildMode } from "./version.js";
export { createProgram, main } from "./cli.js";
