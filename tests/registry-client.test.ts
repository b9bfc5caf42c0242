import { describe, expect, it, vi } from "vitest";

import { RegistryClient } from "../src/http/registry-client.js";
import { ImageLabel } from "../src/label.js";

const LABEL = new ImageLabel("example.org", null, "foo-bar", "0.0.1");

describe("RegistryClient", () => {
  describe("manifestUrl", () => {
    it("points at the v2 manifest endpoint", () => {
      const client = new RegistryClient({ registry: "example.org" });
      expect(client.manifestUrl(LABEL)).toBe("https://example.org/v2/foo-bar/manifests/0.0.1");
      expect(client.manifestUrl(new ImageLabel("example.org", "team", "foo-bar", "0.0.1~alpha1"))).toBe(
        "https://example.org/v2/team/foo-bar/manifests/0.0.1~alpha1"
      );
    });

    it("is null without a registry", () => {
      expect(new RegistryClient({ registry: null }).manifestUrl(LABEL)).toBeNull();
    });
  });

  describe("isPublished", () => {
    const client = (retries = 0) =>
      new RegistryClient({ registry: "example.org" }, { retries, retryDelayMs: 0, timeoutMs: 1000 });

    it("is true for a 200 answer", async () => {
      const fetchMock = vi.fn().mockResolvedValue(new Response(null, { status: 200 }));
      vi.stubGlobal("fetch", fetchMock);

      await expect(client().isPublished(LABEL)).resolves.toBe(true);
      expect(fetchMock).toHaveBeenCalledWith(
        "https://example.org/v2/foo-bar/manifests/0.0.1",
        expect.objectContaining({ headers: expect.objectContaining({ "User-Agent": "imagetree" }) })
      );
      vi.unstubAllGlobals();
    });

    it("is false for a 404 answer", async () => {
      vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response(null, { status: 404 })));

      await expect(client().isPublished(LABEL)).resolves.toBe(false);
      vi.unstubAllGlobals();
    });

    it("is false when the registry keeps failing", async () => {
      const fetchMock = vi.fn().mockResolvedValue(new Response(null, { status: 500 }));
      vi.stubGlobal("fetch", fetchMock);

      await expect(client(1).isPublished(LABEL)).resolves.toBe(false);
      expect(fetchMock).toHaveBeenCalledTimes(2);
      vi.unstubAllGlobals();
    });

    it("retries server errors", async () => {
      const fetchMock = vi
        .fn()
        .mockResolvedValueOnce(new Response(null, { status: 503 }))
        .mockResolvedValueOnce(new Response(null, { status: 200 }));
      vi.stubGlobal("fetch", fetchMock);

      await expect(client(1).isPublished(LABEL)).resolves.toBe(true);
      expect(fetchMock).toHaveBeenCalledTimes(2);
      vi.unstubAllGlobals();
    });

    it("propagates network errors", async () => {
      vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new TypeError("fetch failed")));

      await expect(client().isPublished(LABEL)).rejects.toThrow("fetch failed");
      vi.unstubAllGlobals();
    });

    it("hands an abort signal to the request", async () => {
      const fetchMock = vi.fn().mockResolvedValue(new Response(null, { status: 200 }));
      vi.stubGlobal("fetch", fetchMock);

      await client().isPublished(LABEL);
      expect(fetchMock).toHaveBeenCalledWith(
        "https://example.org/v2/foo-bar/manifests/0.0.1",
        expect.objectContaining({ signal: expect.any(AbortSignal) })
      );
      vi.unstubAllGlobals();
    });

    it("aborts a request that takes too long", async () => {
      const signals: AbortSignal[] = [];
      const fetchMock = vi.fn(
        (_url: string, init: { signal: AbortSignal }) =>
          new Promise<Response>((_, reject) => {
            signals.push(init.signal);
            init.signal.addEventListener("abort", () => reject(new Error("aborted")));
          })
      );
      vi.stubGlobal("fetch", fetchMock);
      const slow = new RegistryClient({ registry: "example.org" }, { retries: 0, retryDelayMs: 0, timeoutMs: 5 });

      await expect(slow.isPublished(LABEL)).rejects.toThrow("Registry manifest request timed out after 5ms");
      expect(signals).toHaveLength(1);
      expect(signals[0]?.aborted).toBe(true);
      vi.unstubAllGlobals();
    });

    it("does not query anything without a registry", async () => {
      const fetchMock = vi.fn();
      vi.stubGlobal("fetch", fetchMock);

      await expect(new RegistryClient({ registry: null }).isPublished(LABEL)).resolves.toBe(false);
      expect(fetchMock).not.toHaveBeenCalled();
      vi.unstubAllGlobals();
    });
  });
});
