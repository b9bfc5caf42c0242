/**
 * Driver backed by the docker command line.
 */

import { join } from "node:path";

import type { ImageTreeConfig } from "../config.js";
import { DOCKER_BUILD_TIMEOUT, DOCKER_TRANSFER_TIMEOUT } from "../constants.js";
import { ConfigError, DockerError, ImageBuildError, extractErrorDetails } from "../errors.js";
import type { ImageLabel } from "../label.js";
import { log } from "../logger.js";
import type { Driver, DriverOptions } from "./driver.js";
import { safeDockerRun, streamDockerRun } from "./executor.js";

/** Build output lines that mark the build as failed */
const BUILD_ERROR_LINE = /^(ERROR\b|error:)/;

/**
 * Build args forwarding the configured HTTP proxy, in both spellings.
 */
export function proxyBuildArgs(config: Pick<ImageTreeConfig, "httpProxy">): Record<string, string> {
  const proxy = config.httpProxy;
  if (!proxy) {
    return {};
  }
  return {
    http_proxy: proxy,
    https_proxy: proxy,
    HTTP_PROXY: proxy,
    HTTPS_PROXY: proxy,
  };
}

/**
 * Group `docker images` rows (`<id>\t<repo>:<tag>`) by image id.
 */
export function parseImageList(stdout: string): Map<string, string[]> {
  const images = new Map<string, string[]>();
  for (const row of stdout.split("\n")) {
    const [id, tag] = row.trim().split("\t");
    if (!id || !tag) {
      continue;
    }
    const tags = images.get(id) ?? [];
    tags.push(tag);
    images.set(id, tags);
  }
  return images;
}

export class DockerCliDriver implements Driver {
  readonly label: ImageLabel;
  private readonly config: ImageTreeConfig;
  private readonly nocache: boolean;

  constructor(config: ImageTreeConfig, label: ImageLabel, options: DriverOptions) {
    this.config = config;
    this.label = label;
    this.nocache = options.nocache;
  }

  toString(): string {
    return this.label.full;
  }

  /** Arguments for `docker build`, without the leading "docker". */
  buildArgs(contextDir: string, filename: string): string[] {
    const args = ["build", "-t", this.label.full, "-f", join(contextDir, filename), "--rm"];
    if (this.nocache) {
      args.push("--no-cache");
    }
    for (const [key, value] of Object.entries(proxyBuildArgs(this.config))) {
      args.push("--build-arg", `${key}=${value}`);
    }
    args.push(contextDir);
    return args;
  }

  async exists(): Promise<boolean> {
    const result = await safeDockerRun(["image", "inspect", "--format", "{{.Id}}", this.label.full]);
    return result.exitCode === 0;
  }

  async doBuild(contextDir: string, filename = "Dockerfile"): Promise<string> {
    const imageLog = log.child(this.label.full);
    const failure: { line: string | null } = { line: null };

    const result = await streamDockerRun(
      this.buildArgs(contextDir, filename),
      (line) => {
        const text = line.trimEnd();
        if (BUILD_ERROR_LINE.test(text)) {
          failure.line ??= text;
          imageLog.error(text);
        } else if (text) {
          imageLog.info(text);
        }
      },
      { timeout: DOCKER_BUILD_TIMEOUT }
    );

    if (result.exitCode !== 0 || failure.line !== null) {
      imageLog.error(`Build command failed with exit code ${result.exitCode}${failure.line ? `: ${failure.line}` : ""}`);
      throw new ImageBuildError(`Building image ${this.label.full} failed`);
    }
    return this.label.full;
  }

  async publish(tags: string[]): Promise<boolean> {
    const { username, password, registry } = this.config;
    if (!username || !password) {
      throw new ConfigError("Cannot publish without credentials.");
    }

    const loginArgs = ["login", "--username", username, "--password-stdin"];
    if (registry) {
      loginArgs.push(registry);
    }
    const login = await safeDockerRun(loginArgs, { input: password });
    if (login.exitCode !== 0) {
      log.error(`Failed to log in to ${registry ?? "the registry"}: ${login.stderr.trim()}`);
      return false;
    }

    for (const tag of tags) {
      const reference = `${this.label.name}:${tag}`;
      const push = await safeDockerRun(["push", reference], { timeout: DOCKER_TRANSFER_TIMEOUT });
      if (push.exitCode !== 0) {
        log.error(`Failed to publish image ${reference}: ${push.stderr.trim()}`);
        return false;
      }
    }
    return true;
  }

  async prune(): Promise<boolean> {
    const listing = await safeDockerRun(["images", "--format", "{{.ID}}\t{{.Repository}}:{{.Tag}}", this.label.name]);
    if (listing.exitCode !== 0) {
      log.error(`Could not list images for ${this.label.name}: ${listing.stderr.trim()}`);
      return false;
    }

    let success = true;
    for (const [id, aliases] of parseImageList(listing.stdout)) {
      // Any alias matching the current version keeps the image
      if (aliases.includes(this.label.full)) {
        continue;
      }
      log.info(`Removing image "${aliases[0] ?? id}" (Id: ${id})`);
      try {
        await safeDockerRun(["rmi", id], { check: true });
      } catch (error: unknown) {
        log.error(`Error removing image ${id}: ${extractErrorDetails(error)}`);
        success = false;
      }
    }
    return success;
  }

  async addTag(label: ImageLabel, tag: string): Promise<void> {
    await safeDockerRun(["tag", label.full, `${label.name}:${tag}`], { check: true });
  }

  async clean(): Promise<void> {
    const result = await safeDockerRun(["rmi", this.label.full]);
    if (result.exitCode !== 0 && !/no such image/i.test(result.stderr)) {
      throw new DockerError(`Could not remove image ${this.label.full}: ${result.stderr.trim()}`);
    }
  }

  async pull(reference: string): Promise<boolean> {
    const result = await safeDockerRun(["pull", reference], { timeout: DOCKER_TRANSFER_TIMEOUT });
    if (result.exitCode !== 0) {
      log.error(`Failed to pull ${reference}: ${result.stderr.trim()}`);
      return false;
    }
    return true;
  }

  async extract(src: string, dst: string): Promise<void> {
    const suffix = Math.random().toString(36).slice(2, 7);
    const container = `${this.label.shortName}-ephemeral-${suffix}`;
    try {
      await safeDockerRun(["create", "--name", container, this.label.full], { check: true });
      await safeDockerRun(["cp", `${container}:${src}`, dst], { check: true });
    } catch (error: unknown) {
      log.error(`${this.label.full} - error during the extraction: ${extractErrorDetails(error)}`);
      throw new ImageBuildError("Building artifacts failed");
    } finally {
      const removal = await safeDockerRun(["rm", "-f", container]);
      if (removal.exitCode !== 0) {
        log.debug(`Container ${container} was not removed: ${removal.stderr.trim()}`);
      }
    }
  }
}
