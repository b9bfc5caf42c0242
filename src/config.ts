/**
 * Configuration model for imagetree.
 *
 * Dependency direction:
 *   This module has minimal dependencies (near-leaf module).
 *   It may be imported by: every module that reads settings.
 *   It should NOT import from: cli, builder, commands
 */

import { DEFAULT_SCAN_WORKERS } from "./constants.js";

/** A value as it can appear in a configuration file. */
export type ConfigValue =
  | string
  | number
  | boolean
  | null
  | ConfigValue[]
  | { [key: string]: ConfigValue };

/**
 * Process configuration.
 *
 * On disk keys are snake_case (`base_images`, `scan_workers`...); see
 * config-file.ts for the mapping.
 */
export interface ImageTreeConfig {
  /** Registry host images are published to, e.g. docker-registry.example.org */
  registry: string | null;
  /** Namespace within the registry */
  namespace: string | null;
  username: string | null;
  password: string | null;
  /** Default base image, available to templates as `seed_image` */
  seedImage: string;
  /** Extra options passed to apt-get by the apt_install/apt_remove filters */
  aptOptions: string;
  /** Proxy used only by apt inside builds */
  aptOnlyProxy: string | null;
  /** Proxy passed to builds as build args */
  httpProxy: string | null;
  /** Images built elsewhere that templates may reference by name */
  baseImages: string[];
  /** Width of the worker pool used while scanning */
  scanWorkers: number;
  fallbackAuthor: string;
  fallbackEmail: string;
  /** Distribution written in new changelog entries */
  distribution: string;
  /** Identifier used when bumping versions, e.g. "s" gives 1.0-s1 */
  updateId: string;
  /** user name -> numeric uid, used by the uid/add_user filters */
  knownUidMappings: Record<string, number>;
  /** Reject images whose final USER instruction is not numeric */
  forceNumericUser: boolean;
  /** Executable run to verify a freshly built image */
  verifyCommand: string;
  /** Arguments for verifyCommand; {path} and {image} are substituted */
  verifyArgs: string[];
  /** Driver implementation name */
  driver: string;
  /** Keys imagetree does not interpret, exposed to templates verbatim */
  extra: Record<string, ConfigValue>;
}

export const DEFAULT_CONFIG: Readonly<ImageTreeConfig> = Object.freeze({
  registry: null,
  namespace: null,
  username: null,
  password: null,
  seedImage: "debian:bookworm-slim",
  aptOptions: "",
  aptOnlyProxy: null,
  httpProxy: null,
  baseImages: [],
  scanWorkers: DEFAULT_SCAN_WORKERS,
  fallbackAuthor: "Author",
  fallbackEmail: "email@domain",
  distribution: "stable",
  updateId: "s",
  knownUidMappings: {},
  forceNumericUser: false,
  verifyCommand: "/bin/bash",
  verifyArgs: ["-c", "{path}/test.sh {image}"],
  driver: "docker",
  extra: {},
});

/**
 * Fresh mutable copy of the defaults, optionally overridden.
 */
export function makeConfig(overrides: Partial<ImageTreeConfig> = {}): ImageTreeConfig {
  return {
    ...DEFAULT_CONFIG,
    baseImages: [...DEFAULT_CONFIG.baseImages],
    knownUidMappings: { ...DEFAULT_CONFIG.knownUidMappings },
    verifyArgs: [...DEFAULT_CONFIG.verifyArgs],
    extra: {},
    ...overrides,
  };
}

/**
 * True when publishing is possible: a registry and both credentials are set.
 */
export function canPublish(config: ImageTreeConfig): boolean {
  return Boolean(config.registry && config.username && config.password);
}

/**
 * The variables a Dockerfile template sees, keyed the way they are written
 * in the configuration file.
 */
export function templateContext(config: ImageTreeConfig): Record<string, ConfigValue> {
  return {
    ...config.extra,
    registry: config.registry,
    namespace: config.namespace,
    seed_image: config.seedImage,
    apt_options: config.aptOptions,
    apt_only_proxy: config.aptOnlyProxy,
    http_proxy: config.httpProxy,
    base_images: config.baseImages,
    distribution: config.distribution,
    known_uid_mappings: config.knownUidMappings,
  };
}
