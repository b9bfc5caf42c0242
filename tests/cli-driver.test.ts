import { describe, expect, it, vi } from "vitest";

const mocks = vi.hoisted(() => ({ safeDockerRun: vi.fn(), streamDockerRun: vi.fn() }));
vi.mock("../src/docker/executor.js", () => ({
  safeDockerRun: mocks.safeDockerRun,
  streamDockerRun: mocks.streamDockerRun,
}));

import { makeConfig, type ImageTreeConfig } from "../src/config.js";
import { DOCKER_BUILD_TIMEOUT, DOCKER_TRANSFER_TIMEOUT } from "../src/constants.js";
import { DockerCliDriver, parseImageList, proxyBuildArgs } from "../src/docker/cli-driver.js";
import { ConfigError, DockerError, ImageBuildError } from "../src/errors.js";
import { ImageLabel } from "../src/label.js";

const result = (exitCode = 0, stdout = "", stderr = "") => ({ exitCode, stdout, stderr });

function makeDriver(overrides: Partial<ImageTreeConfig> = {}, nocache = true): DockerCliDriver {
  const config = makeConfig(overrides);
  return new DockerCliDriver(config, ImageLabel.fromConfig(config, "foo-bar", "0.0.1"), { nocache });
}

describe("proxyBuildArgs", () => {
  it("is empty without a proxy", () => {
    expect(proxyBuildArgs({ httpProxy: null })).toEqual({});
  });

  it("sets both spellings of the proxy variables", () => {
    expect(proxyBuildArgs({ httpProxy: "http://proxy.example.org:3128" })).toEqual({
      http_proxy: "http://proxy.example.org:3128",
      https_proxy: "http://proxy.example.org:3128",
      HTTP_PROXY: "http://proxy.example.org:3128",
      HTTPS_PROXY: "http://proxy.example.org:3128",
    });
  });
});

describe("parseImageList", () => {
  it("groups tags by image id", () => {
    const listing = "aaa\tfoo-bar:0.0.1\naaa\tfoo-bar:latest\n\nbbb\tfoo-bar:0.0.0\n";
    expect([...parseImageList(listing)]).toEqual([
      ["aaa", ["foo-bar:0.0.1", "foo-bar:latest"]],
      ["bbb", ["foo-bar:0.0.0"]],
    ]);
  });
});

describe("DockerCliDriver", () => {
  it("builds the docker build command line", () => {
    expect(makeDriver().buildArgs("/ctx", "Dockerfile")).toEqual([
      "build",
      "-t",
      "foo-bar:0.0.1",
      "-f",
      "/ctx/Dockerfile",
      "--rm",
      "--no-cache",
      "/ctx",
    ]);

    expect(makeDriver({ httpProxy: "http://proxy:3128" }, false).buildArgs("/ctx", "Dockerfile.build")).toEqual([
      "build",
      "-t",
      "foo-bar:0.0.1",
      "-f",
      "/ctx/Dockerfile.build",
      "--rm",
      "--build-arg",
      "http_proxy=http://proxy:3128",
      "--build-arg",
      "https_proxy=http://proxy:3128",
      "--build-arg",
      "HTTP_PROXY=http://proxy:3128",
      "--build-arg",
      "HTTPS_PROXY=http://proxy:3128",
      "/ctx",
    ]);
  });

  it("inspects the image to know if it exists", async () => {
    mocks.safeDockerRun.mockResolvedValueOnce(result(0, "sha256:abc")).mockResolvedValueOnce(result(1));
    const driver = makeDriver();

    await expect(driver.exists()).resolves.toBe(true);
    await expect(driver.exists()).resolves.toBe(false);
    expect(mocks.safeDockerRun).toHaveBeenCalledWith(["image", "inspect", "--format", "{{.Id}}", "foo-bar:0.0.1"]);
  });

  describe("doBuild", () => {
    it("returns the built label", async () => {
      mocks.streamDockerRun.mockImplementation(async (_args: string[], onLine: (line: string) => void) => {
        onLine("Step 1/2 : FROM debian");
        return result(0);
      });

      await expect(makeDriver().doBuild("/ctx")).resolves.toBe("foo-bar:0.0.1");
      expect(mocks.streamDockerRun).toHaveBeenCalledWith(
        ["build", "-t", "foo-bar:0.0.1", "-f", "/ctx/Dockerfile", "--rm", "--no-cache", "/ctx"],
        expect.any(Function),
        { timeout: DOCKER_BUILD_TIMEOUT }
      );
    });

    it("fails on an error line even when docker exits cleanly", async () => {
      mocks.streamDockerRun.mockImplementation(async (_args: string[], onLine: (line: string) => void) => {
        onLine("ERROR: failed to solve");
        return result(0);
      });

      await expect(makeDriver().doBuild("/ctx")).rejects.toThrow(ImageBuildError);
    });

    it("fails on a non-zero exit", async () => {
      mocks.streamDockerRun.mockResolvedValue(result(1));

      await expect(makeDriver().doBuild("/ctx")).rejects.toThrow("Building image foo-bar:0.0.1 failed");
    });
  });

  describe("publish", () => {
    const credentials = { registry: "example.org", username: "test-user", password: "test-secret" };

    it("logs in then pushes every tag", async () => {
      mocks.safeDockerRun.mockResolvedValue(result(0));

      await expect(makeDriver(credentials).publish(["0.0.1", "latest"])).resolves.toBe(true);
      expect(mocks.safeDockerRun.mock.calls).toEqual([
        [["login", "--username", "test-user", "--password-stdin", "example.org"], { input: "test-secret" }],
        [["push", "example.org/foo-bar:0.0.1"], { timeout: DOCKER_TRANSFER_TIMEOUT }],
        [["push", "example.org/foo-bar:latest"], { timeout: DOCKER_TRANSFER_TIMEOUT }],
      ]);
    });

    it("stops when the login fails", async () => {
      mocks.safeDockerRun.mockResolvedValueOnce(result(1, "", "unauthorized"));

      await expect(makeDriver(credentials).publish(["0.0.1"])).resolves.toBe(false);
      expect(mocks.safeDockerRun).toHaveBeenCalledTimes(1);
    });

    it("stops at the first failed push", async () => {
      mocks.safeDockerRun.mockResolvedValueOnce(result(0)).mockResolvedValueOnce(result(1, "", "denied"));

      await expect(makeDriver(credentials).publish(["0.0.1", "latest"])).resolves.toBe(false);
      expect(mocks.safeDockerRun).toHaveBeenCalledTimes(2);
    });

    it("refuses to run without credentials", async () => {
      await expect(makeDriver({ registry: "example.org" }).publish(["0.0.1"])).rejects.toThrow(ConfigError);
      expect(mocks.safeDockerRun).not.toHaveBeenCalled();
    });
  });

  describe("prune", () => {
    const listing = "aaa\tfoo-bar:0.0.1\naaa\tfoo-bar:latest\nbbb\tfoo-bar:0.0.0\nccc\tfoo-bar:nightly\n";

    it("removes the images not tagged with the current version", async () => {
      mocks.safeDockerRun.mockResolvedValueOnce(result(0, listing)).mockResolvedValue(result(0));

      await expect(makeDriver().prune()).resolves.toBe(true);
      expect(mocks.safeDockerRun.mock.calls).toEqual([
        [["images", "--format", "{{.ID}}\t{{.Repository}}:{{.Tag}}", "foo-bar"]],
        [["rmi", "bbb"], { check: true }],
        [["rmi", "ccc"], { check: true }],
      ]);
    });

    it("keeps going after a failed removal", async () => {
      mocks.safeDockerRun
        .mockResolvedValueOnce(result(0, listing))
        .mockRejectedValueOnce(new DockerError("image is in use"))
        .mockResolvedValue(result(0));

      await expect(makeDriver().prune()).resolves.toBe(false);
      expect(mocks.safeDockerRun).toHaveBeenLastCalledWith(["rmi", "ccc"], { check: true });
    });

    it("fails when the images cannot be listed", async () => {
      mocks.safeDockerRun.mockResolvedValueOnce(result(1, "", "daemon error"));

      await expect(makeDriver().prune()).resolves.toBe(false);
      expect(mocks.safeDockerRun).toHaveBeenCalledTimes(1);
    });
  });

  it("tags images", async () => {
    mocks.safeDockerRun.mockResolvedValue(result(0));
    const driver = makeDriver();

    await driver.addTag(driver.label, "latest");
    expect(mocks.safeDockerRun).toHaveBeenCalledWith(["tag", "foo-bar:0.0.1", "foo-bar:latest"], { check: true });
  });

  describe("clean", () => {
    it("ignores images that are already gone", async () => {
      mocks.safeDockerRun.mockResolvedValue(result(1, "", "Error: No such image: foo-bar:0.0.1"));

      await expect(makeDriver().clean()).resolves.toBeUndefined();
      expect(mocks.safeDockerRun).toHaveBeenCalledWith(["rmi", "foo-bar:0.0.1"]);
    });

    it("fails on other errors", async () => {
      mocks.safeDockerRun.mockResolvedValue(result(1, "", "conflict: image is being used"));

      await expect(makeDriver().clean()).rejects.toThrow(
        "Could not remove image foo-bar:0.0.1: conflict: image is being used"
      );
    });
  });

  it("pulls references", async () => {
    mocks.safeDockerRun.mockResolvedValueOnce(result(0)).mockResolvedValueOnce(result(1, "", "not found"));
    const driver = makeDriver();

    await expect(driver.pull("debian:bookworm")).resolves.toBe(true);
    await expect(driver.pull("debian:unknown")).resolves.toBe(false);
    expect(mocks.safeDockerRun).toHaveBeenCalledWith(["pull", "debian:bookworm"], {
      timeout: DOCKER_TRANSFER_TIMEOUT,
    });
  });

  describe("extract", () => {
    const container = expect.stringMatching(/^foo-bar-ephemeral-[a-z0-9]*$/);

    it("copies files out of a throwaway container", async () => {
      mocks.safeDockerRun.mockResolvedValue(result(0));

      await makeDriver().extract("/build", "/tmp/out");
      expect(mocks.safeDockerRun.mock.calls).toEqual([
        [["create", "--name", container, "foo-bar:0.0.1"], { check: true }],
        [["cp", expect.stringMatching(/^foo-bar-ephemeral-[a-z0-9]*:\/build$/), "/tmp/out"], { check: true }],
        [["rm", "-f", container]],
      ]);
    });

    it("removes the container when the copy fails", async () => {
      mocks.safeDockerRun
        .mockResolvedValueOnce(result(0))
        .mockRejectedValueOnce(new DockerError("no such path"))
        .mockResolvedValue(result(0));

      await expect(makeDriver().extract("/build", "/tmp/out")).rejects.toThrow("Building artifacts failed");
      expect(mocks.safeDockerRun).toHaveBeenLastCalledWith(["rm", "-f", container]);
    });
  });
});
