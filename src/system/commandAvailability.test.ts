// Tests for the PATH availability check.
import { describe, expect, it, vi } from "vitest";
import { isCommandAvailable } from "@/system/commandAvailability";
import type { CommandOutput, ExecuteCommand } from "@/system/shellCommand";

const exitWith = (code: number): CommandOutput => ({
  code,
  signal: null,
  stdout: code === 0 ? "/usr/bin/ffmpeg\n" : "",
  stderr: ""
});

describe("isCommandAvailable", () => {
  it("uses which on POSIX and reports a zero exit as available", async () => {
    const execute = vi.fn<ExecuteCommand>(async () => exitWith(0));
    await expect(
      isCommandAvailable("ffmpeg", { platform: "linux", execute })
    ).resolves.toBe(true);
    expect(execute).toHaveBeenCalledWith("which", ["ffmpeg"]);
  });

  it("uses where on Windows", async () => {
    const execute = vi.fn<ExecuteCommand>(async () => exitWith(0));
    await isCommandAvailable("ffprobe", { platform: "win32", execute });
    expect(execute).toHaveBeenCalledWith("where", ["ffprobe"]);
  });

  it("reports a non-zero exit as unavailable", async () => {
    const execute = vi.fn<ExecuteCommand>(async () => exitWith(1));
    await expect(
      isCommandAvailable("ffmpeg", { platform: "darwin", execute })
    ).resolves.toBe(false);
  });

  it("fails closed when the lookup itself cannot run", async () => {
    const execute = vi.fn<ExecuteCommand>(async () => {
      throw new Error("spawn which ENOENT");
    });
    await expect(
      isCommandAvailable("ffmpeg", { platform: "linux", execute })
    ).resolves.toBe(false);
  });

  it("does not spawn anything for a blank name", async () => {
    const execute = vi.fn<ExecuteCommand>(async () => exitWith(0));
    await expect(isCommandAvailable("   ", { execute })).resolves.toBe(false);
    expect(execute).not.toHaveBeenCalled();
  });
});
