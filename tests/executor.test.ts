import { describe, expect, it, vi } from "vitest";

const mocks = vi.hoisted(() => {
  interface FailureFields {
    code?: string;
    timedOut?: boolean;
    exitCode?: number;
    stdout?: string;
    stderr?: string;
  }

  class FakeExecaError extends Error {
    code?: string;
    timedOut: boolean;
    exitCode?: number;
    stdout: string;
    stderr: string;

    constructor(fields: FailureFields = {}) {
      super("Command failed");
      this.code = fields.code;
      this.timedOut = fields.timedOut ?? false;
      this.exitCode = fields.exitCode;
      this.stdout = fields.stdout ?? "";
      this.stderr = fields.stderr ?? "";
    }
  }

  return { execa: vi.fn(), FakeExecaError };
});
vi.mock("execa", () => ({ execa: mocks.execa, ExecaError: mocks.FakeExecaError }));

import { DOCKER_COMMAND_TIMEOUT } from "../src/constants.js";
import { checkDockerStatus, getDockerEnv, safeDockerRun, streamDockerRun } from "../src/docker/executor.js";
import { DockerError, DockerNotFoundError, DockerTimeoutError } from "../src/errors.js";

async function* lines(values: string[]): AsyncGenerator<string> {
  for (const value of values) {
    yield value;
  }
}

async function* failing(error: Error): AsyncGenerator<string> {
  yield "partial output";
  throw error;
}

describe("getDockerEnv", () => {
  it("disables CLI hints", () => {
    expect(getDockerEnv().DOCKER_CLI_HINTS).toBe("false");
  });
});

describe("safeDockerRun", () => {
  it("returns the captured output", async () => {
    mocks.execa.mockResolvedValue({ exitCode: 0, stdout: "abc", stderr: "" });

    await expect(safeDockerRun(["images", "-q"])).resolves.toEqual({ exitCode: 0, stdout: "abc", stderr: "" });
    expect(mocks.execa).toHaveBeenCalledWith(
      "docker",
      ["images", "-q"],
      expect.objectContaining({ timeout: DOCKER_COMMAND_TIMEOUT })
    );
  });

  it("writes input to stdin", async () => {
    mocks.execa.mockResolvedValue({ exitCode: 0, stdout: "", stderr: "" });

    await safeDockerRun(["login", "--password-stdin"], { input: "test-secret", timeout: 5 });
    expect(mocks.execa).toHaveBeenCalledWith(
      "docker",
      ["login", "--password-stdin"],
      expect.objectContaining({ input: "test-secret", timeout: 5 })
    );
  });

  it("returns non-zero exits", async () => {
    mocks.execa.mockRejectedValue(new mocks.FakeExecaError({ exitCode: 1, stderr: "boom" }));

    await expect(safeDockerRun(["rmi", "abc"])).resolves.toEqual({ exitCode: 1, stdout: "", stderr: "boom" });
  });

  it("throws non-zero exits when checked", async () => {
    mocks.execa.mockRejectedValue(new mocks.FakeExecaError({ exitCode: 1, stderr: "boom\n" }));

    const run = safeDockerRun(["rmi", "abc"], { check: true });
    await expect(run).rejects.toThrow(DockerError);
    await expect(run).rejects.toThrow("Docker command failed: docker rmi abc... (boom)");
  });

  it("reports a missing docker binary", async () => {
    mocks.execa.mockRejectedValue(new mocks.FakeExecaError({ code: "ENOENT" }));

    const run = safeDockerRun(["version"]);
    await expect(run).rejects.toThrow(DockerNotFoundError);
    await expect(run).rejects.toThrow("Docker not found in PATH. Command: docker version...");
  });

  it("reports timeouts", async () => {
    mocks.execa.mockRejectedValue(new mocks.FakeExecaError({ timedOut: true }));

    await expect(safeDockerRun(["pull", "debian"], { timeout: 10 })).rejects.toThrow(DockerTimeoutError);
  });

  it("rethrows unrelated errors", async () => {
    mocks.execa.mockRejectedValue(new TypeError("unexpected"));

    await expect(safeDockerRun(["info"])).rejects.toThrow(TypeError);
  });
});

describe("streamDockerRun", () => {
  it("hands every line over as it arrives", async () => {
    mocks.execa.mockReturnValue(
      Object.assign(Promise.resolve({ exitCode: 0 }), { iterable: () => lines(["Step 1/2", "Step 2/2"]) })
    );
    const seen: string[] = [];

    await expect(streamDockerRun(["build", "."], (line) => seen.push(line))).resolves.toEqual({
      exitCode: 0,
      stdout: "",
      stderr: "",
    });
    expect(seen).toEqual(["Step 1/2", "Step 2/2"]);
    expect(mocks.execa).toHaveBeenCalledWith(
      "docker",
      ["build", "."],
      expect.objectContaining({ all: true, buffer: false })
    );
  });

  it("returns the exit code of a failed command", async () => {
    mocks.execa.mockReturnValue(
      Object.assign(Promise.resolve({ exitCode: 0 }), {
        iterable: () => failing(new mocks.FakeExecaError({ exitCode: 2, stderr: "ignored" })),
      })
    );
    const seen: string[] = [];

    await expect(streamDockerRun(["build", "."], (line) => seen.push(line))).resolves.toEqual({
      exitCode: 2,
      stdout: "",
      stderr: "",
    });
    expect(seen).toEqual(["partial output"]);
  });

  it("throws a failed command when checked", async () => {
    mocks.execa.mockReturnValue(
      Object.assign(Promise.resolve({ exitCode: 0 }), {
        iterable: () => failing(new mocks.FakeExecaError({ exitCode: 2 })),
      })
    );

    await expect(streamDockerRun(["build", "."], () => undefined, { check: true })).rejects.toThrow(
      "Docker command failed: docker build ...."
    );
  });
});

describe("checkDockerStatus", () => {
  it("is true when docker info succeeds", async () => {
    mocks.execa.mockResolvedValue({ exitCode: 0, stdout: "", stderr: "" });
    await expect(checkDockerStatus()).resolves.toBe(true);
  });

  it("is false when docker info fails", async () => {
    mocks.execa.mockRejectedValue(new mocks.FakeExecaError({ exitCode: 1 }));
    await expect(checkDockerStatus()).resolves.toBe(false);
  });

  it("is false when docker is missing", async () => {
    mocks.execa.mockRejectedValue(new mocks.FakeExecaError({ code: "ENOENT" }));
    await expect(checkDockerStatus()).resolves.toBe(false);
  });
});
