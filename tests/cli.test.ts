import { writeFileSync } from "node:fs";
import { join } from "node:path";

import { CommanderError } from "commander";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const mocks = vi.hoisted(() => ({
  runBuild: vi.fn(),
  runPrune: vi.fn(),
  runUpdate: vi.fn(),
  checkDockerStatus: vi.fn(),
}));

vi.mock("../src/commands/build.js", () => ({ runBuild: mocks.runBuild }));
vi.mock("../src/commands/prune.js", () => ({ runPrune: mocks.runPrune }));
vi.mock("../src/commands/update.js", async (importOriginal) => ({
  ...(await importOriginal<typeof import("../src/commands/update.js")>()),
  runUpdate: mocks.runUpdate,
}));
vi.mock("../src/docker/executor.js", async (importOriginal) => ({
  ...(await importOriginal<typeof import("../src/docker/executor.js")>()),
  checkDockerStatus: mocks.checkDockerStatus,
}));

import { createProgram, main } from "../src/cli.js";
import { ScanError } from "../src/errors.js";
import { ExitCode } from "../src/error-handler.js";
import { log, setLogFile } from "../src/logger.js";
import { tempDir } from "./mocks/image-tree.js";

const run = (...args: string[]) => main(["node", "imagetree", "--info", ...args]);

describe("cli", () => {
  beforeEach(() => {
    vi.stubEnv("XDG_CONFIG_HOME", tempDir());
    mocks.runBuild.mockResolvedValue(ExitCode.SUCCESS);
    mocks.runPrune.mockResolvedValue(ExitCode.SUCCESS);
    mocks.runUpdate.mockResolvedValue(ExitCode.SUCCESS);
    mocks.checkDockerStatus.mockResolvedValue(true);
    vi.spyOn(log, "red").mockImplementation(() => undefined);
    vi.spyOn(log, "error").mockImplementation(() => undefined);
    vi.spyOn(log, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    process.exitCode = 0;
    setLogFile(null);
    vi.unstubAllEnvs();
  });

  describe("build", () => {
    it("passes the build options to the builder", async () => {
      await run("build", "--nightly", "--use-cache", "--select", "foo*", "/tmp/images");

      expect(mocks.runBuild).toHaveBeenCalledWith(
        expect.objectContaining({
          root: "/tmp/images",
          selection: "foo*",
          nocache: false,
          // No registry configured
          pull: false,
          buildMode: { kind: "nightly", suffix: expect.stringMatching(/^\d{8}-\d{6}$/) },
        })
      );
      expect(process.exitCode).toBe(ExitCode.SUCCESS);
    });

    it("reads the configuration file", async () => {
      const configFile = join(tempDir(), "config.yaml");
      writeFileSync(configFile, "registry: example.org\nnamespace: team\n");

      await main(["node", "imagetree", "-c", configFile, "--info", "build", "/tmp/images"]);

      expect(mocks.runBuild).toHaveBeenCalledWith(
        expect.objectContaining({ selection: null, nocache: true, pull: true, buildMode: { kind: "release" } })
      );
      const [builder] = mocks.runBuild.mock.calls[0] ?? [];
      expect(builder).toHaveProperty("config.registry", "example.org");
      expect(builder).toHaveProperty("config.namespace", "team");
    });

    it("turns off pulling on request", async () => {
      const configFile = join(tempDir(), "config.yaml");
      writeFileSync(configFile, "registry: example.org\n");

      await main(["node", "imagetree", "-c", configFile, "--info", "build", "--no-pull", "/tmp/images"]);

      expect(mocks.runBuild).toHaveBeenCalledWith(expect.objectContaining({ pull: false }));
    });

    it("fails when a named configuration file is missing", async () => {
      await main(["node", "imagetree", "-c", join(tempDir(), "missing.yaml"), "--info", "build", "/tmp/images"]);

      expect(mocks.runBuild).not.toHaveBeenCalled();
      expect(process.exitCode).toBe(ExitCode.USAGE);
    });

    it("fails when docker is not running", async () => {
      mocks.checkDockerStatus.mockResolvedValue(false);

      await run("build", "/tmp/images");

      expect(mocks.runBuild).not.toHaveBeenCalled();
      expect(process.exitCode).toBe(ExitCode.ENGINE);
    });

    it("maps scan failures to their exit status", async () => {
      mocks.runBuild.mockRejectedValue(new ScanError("/tmp/images/foo", new Error("bad changelog")));

      await run("build", "/tmp/images");

      expect(process.exitCode).toBe(ExitCode.TREE);
    });
  });

  describe("prune", () => {
    it("keeps the given nightly build", async () => {
      await run("prune", "--nightly", "20261019-164400", "--select", "foo*", "/tmp/images");

      expect(mocks.runPrune).toHaveBeenCalledWith(
        expect.objectContaining({
          selection: "foo*",
          nocache: true,
          pull: false,
          buildMode: { kind: "nightly", suffix: "20261019-164400" },
        })
      );
    });

    it("defaults to release versions", async () => {
      await run("prune", "/tmp/images");

      expect(mocks.runPrune).toHaveBeenCalledWith(expect.objectContaining({ buildMode: { kind: "release" } }));
    });
  });

  describe("update", () => {
    it("selects the named image", async () => {
      await run("update", "someImage", "--reason", "CVE fix", "-v", "2.0", "/tmp/images");

      expect(mocks.runUpdate).toHaveBeenCalledWith(expect.objectContaining({ selection: "*someImage:*" }), {
        name: "someImage",
        reason: "CVE fix",
        version: "2.0",
      });
    });

    it("uses the default reason", async () => {
      await run("update", "someImage", "/tmp/images");

      expect(mocks.runUpdate).toHaveBeenCalledWith(expect.anything(), {
        name: "someImage",
        reason: "Security update",
        version: undefined,
      });
    });

    it("reports partial failures", async () => {
      mocks.runUpdate.mockResolvedValue(ExitCode.PARTIAL_FAILURE);

      await run("update", "someImage", "/tmp/images");

      expect(process.exitCode).toBe(ExitCode.PARTIAL_FAILURE);
    });
  });

  it("rejects --debug together with --info", async () => {
    const program = createProgram();
    for (const command of [program, ...program.commands]) {
      command.exitOverride();
      command.configureOutput({ writeErr: () => undefined, writeOut: () => undefined });
    }

    const parse = program.parseAsync(["node", "imagetree", "--debug", "--info", "build", "/tmp/images"]);
    await expect(parse).rejects.toThrow(CommanderError);
    await expect(parse).rejects.toMatchObject({ code: "commander.conflictingOption" });
    expect(mocks.runBuild).not.toHaveBeenCalled();
  });
});
