import { afterEach, describe, expect, it, vi } from "vitest";
import { spawn } from "node:child_process";
import { DryRunRunner, ProcessRunner } from "./command-runner";
import { Logger } from "./logger";

vi.mock("node:child_process", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:child_process")>();
  return { ...actual, spawn: vi.fn(actual.spawn) };
});

describe("ProcessRunner", () => {
  const runner = new ProcessRunner(new Logger("error"));

  afterEach(() => {
    vi.mocked(spawn).mockClear();
  });

  it("reports exit code 0 for a successful command", async () => {
    const result = await runner.run({
      command: "sh",
      args: ["-c", "exit 0"],
      quiet: true,
    });

    expect(result).toEqual({ exitCode: 0, signal: null });
  });

  it("passes a non-zero exit code through", async () => {
    const result = await runner.run({
      command: "sh",
      args: ["-c", "exit 3"],
      quiet: true,
    });

    expect(result).toEqual({ exitCode: 3, signal: null });
  });

  it("reports the signal of a killed process", async () => {
    const result = await runner.run({
      command: "sh",
      args: ["-c", "kill -TERM $$"],
      quiet: true,
    });

    expect(result).toEqual({ exitCode: null, signal: "SIGTERM" });
  });

  it("discards output of quiet commands", async () => {
    await runner.run({ command: "sh", args: ["-c", "exit 0"], quiet: true });

    expect(spawn).toHaveBeenCalledWith("sh", ["-c", "exit 0"], {
      stdio: "ignore",
    });
  });

  it("inherits output of other commands", async () => {
    await runner.run({ command: "sh", args: ["-c", "exit 0"], quiet: false });

    expect(spawn).toHaveBeenCalledWith("sh", ["-c", "exit 0"], {
      stdio: "inherit",
    });
  });

  it("rejects when the command cannot be spawned", async () => {
    await expect(
      runner.run({
        command: "minegraph-missing-runtime",
        args: ["run"],
        quiet: true,
      }),
    ).rejects.toMatchObject({ code: "ENOENT" });
  });
});

describe("DryRunRunner", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints the command and reports success", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const runner = new DryRunRunner(new Logger("info"));

    const result = await runner.run({
      command: "docker",
      args: ["run", "--rm", "-v", "/o:/output", "img", "bash", "-c", "RepeatMasker -pa 8"],
      quiet: true,
    });

    expect(result).toEqual({ exitCode: 0, signal: null });
    expect(log).toHaveBeenCalledWith(
      "[INFO] [DRY RUN] docker run --rm -v /o:/output img bash -c 'RepeatMasker -pa 8'",
    );
  });
});
