/**
 * Docker registry client.
 *
 * Answers one question: is a given image version already in the registry?
 * Uses the registry v2 manifest endpoint with retry and timeout.
 */

import type { ImageTreeConfig } from "../config.js";
import { REGISTRY_REQUEST_TIMEOUT } from "../constants.js";
import type { ImageLabel } from "../label.js";
import { log } from "../logger.js";
import { retryAsync } from "../utils/retry-with-backoff.js";

const MANIFEST_ACCEPT = [
  "application/vnd.docker.distribution.manifest.v2+json",
  "application/vnd.docker.distribution.manifest.list.v2+json",
  "application/vnd.oci.image.manifest.v1+json",
  "application/vnd.oci.image.index.v1+json",
].join(", ");

/** Run a request with a timeout; the request's signal is aborted when it expires. */
async function withTimeout<T>(run: (signal: AbortSignal) => Promise<T>, ms: number, label = "Operation"): Promise<T> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), ms);
  // Listen before the request does, so the timeout error wins the race
  const timeout = new Promise<never>((_, reject) => {
    controller.signal.addEventListener("abort", () => reject(new Error(`${label} timed out after ${ms}ms`)));
  });
  try {
    return await Promise.race([run(controller.signal), timeout]);
  } finally {
    clearTimeout(timeoutId);
  }
}

class RegistryServerError extends Error {
  constructor(url: string, status: number) {
    super(`Registry returned ${status} for ${url}`);
    this.name = "RegistryServerError";
  }
}

export interface RegistryClientOptions {
  retries?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
}

export class RegistryClient {
  private readonly registry: string | null;
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly timeoutMs: number;

  constructor(config: Pick<ImageTreeConfig, "registry">, options: RegistryClientOptions = {}) {
    this.registry = config.registry;
    this.retries = options.retries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.timeoutMs = options.timeoutMs ?? REGISTRY_REQUEST_TIMEOUT;
  }

  /**
   * Manifest URL for a label, or null when no registry is configured.
   */
  manifestUrl(label: ImageLabel): string | null {
    if (!this.registry) {
      return null;
    }
    const namespace = label.namespace ? `/${label.namespace}` : "";
    return `https://${this.registry}/v2${namespace}/${label.shortName}/manifests/${label.version}`;
  }

  /**
   * True only when the registry answers 200 for the label's manifest.
   * Without a registry the answer is always false.
   */
  async isPublished(label: ImageLabel): Promise<boolean> {
    const url = this.manifestUrl(label);
    if (url === null) {
      return false;
    }

    try {
      const status = await retryAsync(async () => {
        const response = await withTimeout(
          (signal) => fetch(url, { headers: { Accept: MANIFEST_ACCEPT, "User-Agent": "imagetree" }, signal }),
          this.timeoutMs,
          "Registry manifest request"
        );
        if (response.status >= 500) {
          throw new RegistryServerError(url, response.status);
        }
        return response.status;
      }, this.retries, this.retryDelayMs, `Manifest request for ${label.full}`);
      log.debug(`Registry answered ${status} for ${url}`);
      return status === 200;
    } catch (error: unknown) {
      if (error instanceof RegistryServerError) {
        log.warn(error.message);
        return false;
      }
      throw error;
    }
  }
}
