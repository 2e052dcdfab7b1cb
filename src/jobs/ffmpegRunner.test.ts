// Tests for the ffmpeg job supervisor and its interruption sequence.
import { describe, expect, it, vi } from "vitest";
import type { CaptureSource } from "@/config/capture";
import {
  interruptProcess,
  runFfmpegJob,
  waitForStopOrExit,
  type FfmpegRunContext,
  type RunPhase
} from "@/jobs/ffmpegRunner";
import type { JobParameters } from "@/jobs/types";
import { createFakeProcess, createFakeSpawner, type FakeProcessScript } from "@/testing/fakeProcess";

const capture: CaptureSource = { format: "x11grab", input: ":0.0", postInputArgs: [] };

const setup = (script: FakeProcessScript, overrides: Partial<FfmpegRunContext> = {}) => {
  const controller = new AbortController();
  const lines: string[] = [];
  const phases: RunPhase[] = [];
  const spawner = createFakeSpawner(script);
  const context: FfmpegRunContext = {
    signal: controller.signal,
    sink: (line) => {
      lines.push(line);
      return true;
    },
    onPhase: (phase) => {
      phases.push(phase);
    },
    spawnProcess: spawner.spawnProcess,
    isAvailable: async () => true,
    inputExists: async () => true,
    capture,
    pollIntervalMs: 5,
    graceMs: 60,
    ...overrides
  };
  return { controller, lines, phases, spawner, context };
};

const capture3s: JobParameters = { outputPath: "/tmp/out.mp4", durationSeconds: 3, fps: 30 };
const manual: JobParameters = { outputPath: "/tmp/out.mp4", durationSeconds: 0, fps: 30 };

describe("interruptProcess", () => {
  it("only reaps a process that already exited", async () => {
    const fake = createFakeProcess();
    fake.exit(0);
    const result = await interruptProcess(fake.handle, { graceMs: 50, pollIntervalMs: 5 });
    expect(result).toEqual({ path: "exited", status: { code: 0, signal: null } });
    expect(fake.calls.interruptedAt).toBeUndefined();
    expect(fake.calls.waitCalls).toBe(1);
  });

  it("stops at SIGINT when the process exits within the grace window", async () => {
    const fake = createFakeProcess({ onInterrupt: { exitAfterMs: 10, code: 255 } });
    const result = await interruptProcess(fake.handle, { graceMs: 200, pollIntervalMs: 5 });
    expect(result.path).toBe("interrupted");
    expect(result.status).toEqual({ code: 255, signal: null });
    expect(fake.calls.terminatedAt).toBeUndefined();
    expect(fake.calls.waitCalls).toBe(1);
  });

  it("waits out the whole grace window before killing", async () => {
    const fake = createFakeProcess({ onInterrupt: "ignore" });
    const result = await interruptProcess(fake.handle, { graceMs: 120, pollIntervalMs: 10 });
    expect(result).toEqual({ path: "terminated", status: { code: null, signal: "SIGKILL" } });
    const { interruptedAt, terminatedAt } = fake.calls;
    expect(interruptedAt).toBeDefined();
    expect(terminatedAt).toBeDefined();
    expect((terminatedAt ?? 0) - (interruptedAt ?? 0)).toBeGreaterThanOrEqual(120);
    expect(fake.calls.waitCalls).toBe(1);
  });
});

describe("waitForStopOrExit", () => {
  it("reports a stop request", async () => {
    const fake = createFakeProcess();
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);
    await expect(waitForStopOrExit(fake.handle, controller.signal, 5)).resolves.toBe(true);
  });

  it("reports a natural exit", async () => {
    const fake = createFakeProcess({ exitAfterMs: 15 });
    await expect(
      waitForStopOrExit(fake.handle, new AbortController().signal, 5)
    ).resolves.toBe(false);
  });
});

describe("runFfmpegJob", () => {
  it("runs a bounded capture to its time limit", async () => {
    const { context, lines, phases, spawner } = setup({ exitAfterMs: 20, exitCode: 0 });
    const result = await runFfmpegJob({ kind: "record", params: capture3s }, context);

    expect(result).toEqual({
      ok: true,
      mode: "bounded",
      interrupted: false,
      status: { code: 0, signal: null }
    });
    expect(phases).toEqual(["running"]);
    expect(spawner.spawned).toHaveLength(1);
    const [{ program, args, fake }] = spawner.spawned;
    expect(program).toBe("ffmpeg");
    expect(args.slice(-3)).toEqual(["-t", "3", "/tmp/out.mp4"]);
    expect(fake.calls.waitCalls).toBe(1);
    expect(fake.calls.interruptedAt).toBeUndefined();
    expect(lines).toEqual(["Initializing recording...", "Recording for 3 seconds..."]);
  });

  it("ignores the stop signal in bounded mode", async () => {
    const { context, controller, spawner } = setup({ exitAfterMs: 40, exitCode: 0 });
    controller.abort();
    const result = await runFfmpegJob({ kind: "record", params: capture3s }, context);
    expect(result.ok).toBe(true);
    expect(spawner.spawned[0]?.fake.calls.interruptedAt).toBeUndefined();
  });

  it("attaches stderr to a failed bounded capture", async () => {
    const { context } = setup({
      stderr: ["[x11grab @ 0x1] Cannot open display :0.0, error 1\n"],
      exitAfterMs: 20,
      exitCode: 1
    });
    const result = await runFfmpegJob({ kind: "record", params: capture3s }, context);
    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.error.code).toBe("ProcessFailed");
    expect(result.error.diagnostics).toBe("[x11grab @ 0x1] Cannot open display :0.0, error 1\n");
    expect(result.error.message).toBe(
      "FFmpeg recording failed\n\n--- ffmpeg log tail ---\n[x11grab @ 0x1] Cannot open display :0.0, error 1"
    );
  });

  it("streams stderr and interrupts a manual capture on stop", async () => {
    const { context, controller, lines, phases, spawner } = setup({
      stderr: ["Input #0, x11grab\n", "frame=1 time=00:00:00.03 bitrate=N/A\r"],
      onInterrupt: { exitAfterMs: 10, code: 255 }
    });
    const startedAt = Date.now();
    setTimeout(() => controller.abort(), 50);
    const result = await runFfmpegJob({ kind: "record", params: manual }, context);

    expect(result).toEqual({
      ok: true,
      mode: "unbounded",
      interrupted: true,
      status: { code: 255, signal: null }
    });
    expect(Date.now() - startedAt).toBeGreaterThanOrEqual(45);
    expect(phases).toEqual(["running", "stopping"]);
    expect(lines).toEqual([
      "Initializing recording...",
      "Recording started. Request stop when ready.",
      "Input #0, x11grab\n",
      "frame=1 time=00:00:00.03 bitrate=N/A\r",
      "Stopping recording...",
      "Recording stopped."
    ]);
    const fake = spawner.spawned[0]?.fake;
    expect(fake?.calls.interruptedAt).toBeDefined();
    expect(fake?.calls.terminatedAt).toBeUndefined();
    expect(fake?.calls.waitCalls).toBe(1);
  });

  it("kills a manual capture that ignores the interrupt, after the grace window", async () => {
    const { context, controller, spawner } = setup({ onInterrupt: "ignore" }, { graceMs: 100 });
    setTimeout(() => controller.abort(), 20);
    const result = await runFfmpegJob({ kind: "record", params: manual }, context);

    expect(result).toMatchObject({ ok: true, interrupted: true });
    const calls = spawner.spawned[0]?.fake.calls;
    expect((calls?.terminatedAt ?? 0) - (calls?.interruptedAt ?? 0)).toBeGreaterThanOrEqual(100);
    expect(calls?.waitCalls).toBe(1);
  });

  it("fails a manual capture that dies on its own", async () => {
    const { context, phases, spawner } = setup({
      stderr: ["Conversion failed!\n"],
      exitAfterMs: 15,
      exitCode: 1
    });
    const result = await runFfmpegJob({ kind: "record", params: manual }, context);
    expect(result).toMatchObject({ ok: false, mode: "unbounded" });
    if (!result.ok) {
      expect(result.error.code).toBe("ProcessFailed");
      expect(result.error.message.startsWith("FFmpeg recording failed unexpectedly.")).toBe(true);
    }
    expect(phases).toEqual(["running", "stopping"]);
    expect(spawner.spawned[0]?.fake.calls.interruptedAt).toBeUndefined();
    expect(spawner.spawned[0]?.fake.calls.waitCalls).toBe(1);
  });

  it("treats error text in an interrupted capture as a failure", async () => {
    const { context, controller } = setup({
      stderr: ["Error writing trailer: error code -5\n"],
      onInterrupt: { exitAfterMs: 5, code: 255 }
    });
    setTimeout(() => controller.abort(), 20);
    const result = await runFfmpegJob({ kind: "record", params: manual }, context);
    expect(result).toMatchObject({ ok: false });
    if (!result.ok) {
      expect(result.error.code).toBe("ProcessFailed");
    }
  });

  it("finishes a conversion that exits cleanly without touching it", async () => {
    const { context, lines, phases, spawner } = setup({ exitAfterMs: 20, exitCode: 0 });
    const result = await runFfmpegJob(
      {
        kind: "convert",
        params: { outputPath: "/tmp/out.gif", inputPath: "/tmp/in.mp4", durationSeconds: 0, fps: 30 }
      },
      context
    );
    expect(result).toMatchObject({ ok: true, mode: "unbounded", interrupted: false });
    expect(phases).toEqual(["running", "stopping"]);
    expect(spawner.spawned[0]?.fake.calls.interruptedAt).toBeUndefined();
    expect(spawner.spawned[0]?.args).toContain("/tmp/in.mp4");
    expect(lines[0]).toBe("Starting video to GIF conversion...");
    expect(spawner.spawned[0]?.fake.calls.waitCalls).toBe(1);
  });

  it("refuses to convert a missing input", async () => {
    const { context, spawner } = setup({}, { inputExists: async () => false });
    const result = await runFfmpegJob(
      {
        kind: "convert",
        params: { outputPath: "/tmp/out.gif", inputPath: "/tmp/gone.mp4", durationSeconds: 0, fps: 30 }
      },
      context
    );
    expect(result).toMatchObject({ ok: false });
    if (!result.ok) {
      expect(result.error.code).toBe("SpawnFailed");
      expect(result.error.message).toBe("Input file does not exist: /tmp/gone.mp4");
    }
    expect(spawner.spawned).toHaveLength(0);
  });

  it("reports a missing ffmpeg without spawning", async () => {
    const { context, spawner } = setup({}, { isAvailable: async () => false });
    const result = await runFfmpegJob({ kind: "record", params: manual }, context);
    expect(result).toMatchObject({ ok: false });
    if (!result.ok) {
      expect(result.error.code).toBe("ToolUnavailable");
    }
    expect(spawner.spawned).toHaveLength(0);
  });

  it("turns a spawn error into SpawnFailed", async () => {
    const spawnProcess = vi.fn(async () => {
      throw Object.assign(new Error("spawn ffmpeg EACCES"), { code: "EACCES" });
    });
    const { context, phases } = setup({}, { spawnProcess });
    const result = await runFfmpegJob({ kind: "record", params: manual }, context);
    expect(result).toMatchObject({ ok: false });
    if (!result.ok) {
      expect(result.error.code).toBe("SpawnFailed");
      expect(result.error.message).toBe("Failed to start ffmpeg: spawn ffmpeg EACCES");
    }
    expect(phases).toEqual([]);
  });

  it("decodes malformed UTF-8 instead of failing", async () => {
    const { context, controller, lines } = setup({
      stderr: [Buffer.from([0x66, 0xff, 0x6f, 0x0a])]
    });
    setTimeout(() => controller.abort(), 20);
    const result = await runFfmpegJob({ kind: "record", params: manual }, context);
    expect(result.ok).toBe(true);
    expect(lines).toContain("f\uFFFDo\n");
  });

  it("keeps supervising after a stderr read error", async () => {
    const { context, controller, spawner } = setup({ onInterrupt: { exitAfterMs: 5, code: 255 } });
    setTimeout(() => spawner.spawned[0]?.fake.handle.stderr?.destroy(new Error("read EIO")), 10);
    setTimeout(() => controller.abort(), 30);
    const result = await runFfmpegJob({ kind: "record", params: manual }, context);
    expect(result).toMatchObject({ ok: true, mode: "unbounded", interrupted: true });
    expect(spawner.spawned[0]?.fake.calls.interruptedAt).toBeDefined();
    expect(spawner.spawned[0]?.fake.calls.waitCalls).toBe(1);
  });
});
