// Owns one ffmpeg process per job: spawn, stderr pump, stop handling and reaping.
import type { Readable } from "node:stream";
import {
  DIAGNOSTIC_TAIL_LINES,
  GRACE_WINDOW_MS,
  POLL_INTERVAL_MS
} from "@/config/app";
import { resolveCaptureSource, type CaptureSource } from "@/config/capture";
import { JobError, formatError, formatErrorWithLogs } from "@/jobs/errors";
import { buildCaptureArgs, buildGifArgs, buildTestCaptureArgs } from "@/jobs/ffmpegArgs";
import { hasErrorMarkers, splitDiagnosticLines } from "@/jobs/ffmpegProgress";
import { resolveJobMode } from "@/jobs/jobParameters";
import type { LogSender } from "@/jobs/logChannel";
import type { JobKind, JobMode, JobParameters } from "@/jobs/types";
import { listCaptureDevices } from "@/system/captureDevices";
import { isCommandAvailable, type AvailabilityCheck } from "@/system/commandAvailability";
import { pathExists } from "@/system/pathExists";
import {
  executeCommand,
  spawnCommand,
  type ExecuteCommand,
  type ExitStatus,
  type ProcessHandle,
  type SpawnProcess
} from "@/system/shellCommand";
import { delay } from "@/utils/time";
import makeDebug from "@/utils/debug";

export const FFMPEG_PROGRAM = "ffmpeg";

export type FfmpegJobRequest = {
  kind: JobKind;
  params: Readonly<JobParameters>;
};

// "running" once the process is up, "stopping" when an unbounded job leaves its wait loop,
// whether a stop was requested or ffmpeg exited by itself.
export type RunPhase = "running" | "stopping";

export type FfmpegRunContext = {
  // Aborting is the stop request. Bounded jobs never look at it.
  signal: AbortSignal;
  sink: LogSender<string>;
  onPhase?: (phase: RunPhase) => void;
  spawnProcess?: SpawnProcess;
  execute?: ExecuteCommand;
  isAvailable?: AvailabilityCheck;
  inputExists?: (path: string) => Promise<boolean>;
  capture?: CaptureSource;
  pollIntervalMs?: number;
  graceMs?: number;
};

export type RunResult =
  | { ok: true; mode: JobMode; interrupted: boolean; status: ExitStatus }
  | { ok: false; mode: JobMode; error: JobError };

// How the process ended: on its own, after SIGINT, or after SIGKILL.
export type InterruptPath = "exited" | "interrupted" | "terminated";

export type InterruptResult = {
  path: InterruptPath;
  status: ExitStatus;
};

type InterruptOptions = {
  graceMs?: number;
  pollIntervalMs?: number;
};

// Caps the stderr kept for diagnostics; the full stream goes to the sink.
const DIAGNOSTIC_TEXT_LIMIT = 64 * 1024;

const debug = makeDebug("jobs:runner");

// Memoizes the reap so every exit path waits on the process exactly once.
const createReaper = (handle: ProcessHandle) => {
  let reaping: Promise<ExitStatus> | null = null;
  return {
    reap: () => {
      reaping ??= handle.wait();
      return reaping;
    },
    isReaped: () => reaping !== null
  };
};

const createDiagnostics = () => {
  let text = "";
  return {
    append: (chunk: string) => {
      text = `${text}${chunk}`;
      if (text.length > DIAGNOSTIC_TEXT_LIMIT) {
        text = text.slice(-DIAGNOSTIC_TEXT_LIMIT);
      }
    },
    text: () => text,
    tail: () => splitDiagnosticLines(text).slice(-DIAGNOSTIC_TAIL_LINES)
  };
};

// Forwards decoded chunks in order. Invalid UTF-8 becomes U+FFFD; read errors just end the stream.
const pumpStream = (stream: Readable | null, onChunk: (text: string) => void) => {
  if (!stream) {
    return;
  }
  const decoder = new TextDecoder("utf-8", { fatal: false });
  stream.on("data", (chunk: Buffer | string) => {
    const text =
      typeof chunk === "string" ? chunk : decoder.decode(chunk, { stream: true });
    if (text) {
      onChunk(text);
    }
  });
  stream.on("end", () => {
    const rest = decoder.decode();
    if (rest) {
      onChunk(rest);
    }
  });
  stream.on("error", (error) => {
    debug("stderr read ended: %O", error);
  });
};

const waitForExit = async (
  handle: ProcessHandle,
  timeoutMs: number,
  stepMs: number
) => {
  const deadline = Date.now() + timeoutMs;
  while (!handle.hasExited() && Date.now() < deadline) {
    await delay(Math.min(stepMs, Math.max(0, deadline - Date.now())));
  }
  return handle.hasExited();
};

// Polls until the stop signal fires or the process ends by itself. True when stop was requested.
export const waitForStopOrExit = async (
  handle: ProcessHandle,
  signal: AbortSignal,
  pollIntervalMs: number = POLL_INTERVAL_MS
) => {
  while (!signal.aborted) {
    if (handle.hasExited()) {
      return false;
    }
    await delay(pollIntervalMs);
  }
  return true;
};

// SIGINT first so ffmpeg can write the container trailer, SIGKILL only after the grace window, then reap.
export const interruptProcess = async (
  handle: ProcessHandle,
  options: InterruptOptions = {},
  reap: () => Promise<ExitStatus> = () => handle.wait()
): Promise<InterruptResult> => {
  const graceMs = options.graceMs ?? GRACE_WINDOW_MS;
  const stepMs = Math.max(1, Math.min(options.pollIntervalMs ?? POLL_INTERVAL_MS, graceMs));
  let path: InterruptPath = "exited";
  try {
    if (!handle.hasExited()) {
      debug("sending interrupt to pid %s", handle.pid);
      handle.interrupt();
      path = "interrupted";
      const exited = await waitForExit(handle, graceMs, stepMs);
      if (!exited) {
        debug("pid %s ignored interrupt for %dms, killing", handle.pid, graceMs);
        handle.terminate();
        path = "terminated";
      }
    }
  } catch (error) {
    debug("interrupt failed for pid %s: %O", handle.pid, error);
  }
  const status = await reap();
  return { path, status };
};

export const buildJobArgs = (request: FfmpegJobRequest, capture: CaptureSource) => {
  const { kind, params } = request;
  if (kind === "convert") {
    return buildGifArgs(params.inputPath ?? "", params.outputPath);
  }
  if (kind === "test") {
    return buildTestCaptureArgs(params.outputPath, capture);
  }
  return buildCaptureArgs(params, capture);
};

const failureLabel = (kind: JobKind) => {
  switch (kind) {
    case "convert":
      return "GIF conversion failed";
    case "test":
      return "Test recording failed";
    default:
      return "FFmpeg recording failed";
  }
};

const processFailed = (message: string, diagnostics: string, tail: string[]) =>
  new JobError("ProcessFailed", formatErrorWithLogs(message, tail), { diagnostics });

const checkPreconditions = async (
  request: FfmpegJobRequest,
  context: FfmpegRunContext
) => {
  const isAvailable = context.isAvailable ?? ((tool: string) => isCommandAvailable(tool));
  if (!(await isAvailable(FFMPEG_PROGRAM))) {
    return new JobError(
      "ToolUnavailable",
      "FFmpeg is not installed. Please install FFmpeg first."
    );
  }
  if (request.kind === "convert") {
    const inputPath = request.params.inputPath ?? "";
    const inputExists = context.inputExists ?? pathExists;
    if (!(await inputExists(inputPath))) {
      return new JobError("SpawnFailed", `Input file does not exist: ${inputPath}`);
    }
  }
  return undefined;
};

const superviseBounded = async (
  request: FfmpegJobRequest,
  handle: ProcessHandle,
  reap: () => Promise<ExitStatus>,
  context: FfmpegRunContext
): Promise<RunResult> => {
  const diagnostics = createDiagnostics();
  pumpStream(handle.stderr, diagnostics.append);
  context.onPhase?.("running");
  context.sink(
    request.kind === "test"
      ? `Test recording in progress (${request.params.durationSeconds} seconds)...`
      : `Recording for ${request.params.durationSeconds} seconds...`
  );

  const status = await reap();
  debug("bounded job exited: code=%s signal=%s", status.code, status.signal);
  if (status.code !== 0) {
    const label = failureLabel(request.kind);
    context.sink(`${label}: ${diagnostics.tail().join("\n")}`);
    return {
      ok: false,
      mode: "bounded",
      error: processFailed(label, diagnostics.text(), diagnostics.tail())
    };
  }
  return { ok: true, mode: "bounded", interrupted: false, status };
};

const superviseUnbounded = async (
  request: FfmpegJobRequest,
  handle: ProcessHandle,
  reap: () => Promise<ExitStatus>,
  context: FfmpegRunContext
): Promise<RunResult> => {
  const diagnostics = createDiagnostics();
  pumpStream(handle.stderr, (text) => {
    diagnostics.append(text);
    context.sink(text);
  });
  context.onPhase?.("running");
  context.sink(
    request.kind === "convert"
      ? "This may take a while depending on video length."
      : "Recording started. Request stop when ready."
  );

  const stopRequested = await waitForStopOrExit(
    handle,
    context.signal,
    context.pollIntervalMs
  );
  context.onPhase?.("stopping");
  if (stopRequested) {
    context.sink(request.kind === "convert" ? "Stopping conversion..." : "Stopping recording...");
  }

  const interruption = await interruptProcess(
    handle,
    { graceMs: context.graceMs, pollIntervalMs: context.pollIntervalMs },
    reap
  );
  const { status } = interruption;
  debug(
    "unbounded job ended: path=%s code=%s signal=%s",
    interruption.path,
    status.code,
    status.signal
  );

  const label = failureLabel(request.kind);
  if (interruption.path === "exited" && status.code !== 0) {
    context.sink(`${label} unexpectedly.`);
    return {
      ok: false,
      mode: "unbounded",
      error: processFailed(`${label} unexpectedly.`, diagnostics.text(), diagnostics.tail())
    };
  }
  if (interruption.path !== "exited" && hasErrorMarkers(diagnostics.text())) {
    return {
      ok: false,
      mode: "unbounded",
      error: processFailed(label, diagnostics.text(), diagnostics.tail())
    };
  }

  if (request.kind !== "convert") {
    context.sink("Recording stopped.");
  }
  return {
    ok: true,
    mode: "unbounded",
    interrupted: interruption.path !== "exited",
    status
  };
};

// Runs one ffmpeg job to the end. Never rejects: every failure comes back as a JobError value.
export const runFfmpegJob = async (
  request: FfmpegJobRequest,
  context: FfmpegRunContext
): Promise<RunResult> => {
  const mode = resolveJobMode(request.kind, request.params);
  const capture = context.capture ?? resolveCaptureSource();
  const spawnProcess = context.spawnProcess ?? spawnCommand;

  const preconditionError = await checkPreconditions(request, context);
  if (preconditionError) {
    context.sink(preconditionError.message);
    return { ok: false, mode, error: preconditionError };
  }

  if (request.kind === "convert") {
    context.sink("Starting video to GIF conversion...");
  } else {
    context.sink(
      request.kind === "test" ? "Starting test recording..." : "Initializing recording..."
    );
    if (request.kind === "test" && capture.format === "avfoundation") {
      const devices = await listCaptureDevices(context.execute ?? executeCommand);
      context.sink("Available capture devices:");
      devices.forEach((line) => context.sink(line));
    }
  }

  const args = buildJobArgs(request, capture);
  debug("runFfmpegJob start: kind=%s mode=%s args=%o", request.kind, mode, args);

  let handle: ProcessHandle;
  try {
    handle = await spawnProcess(FFMPEG_PROGRAM, args);
  } catch (error) {
    const message = `Failed to start ffmpeg: ${formatError(error)}`;
    context.sink(message);
    return {
      ok: false,
      mode,
      error: new JobError("SpawnFailed", message, { cause: error })
    };
  }

  const reaper = createReaper(handle);
  try {
    return mode === "bounded"
      ? await superviseBounded(request, handle, reaper.reap, context)
      : await superviseUnbounded(request, handle, reaper.reap, context);
  } catch (error) {
    debug("supervision failed: %O", error);
    return {
      ok: false,
      mode,
      error: new JobError("ProcessFailed", formatError(error), { cause: error })
    };
  } finally {
    if (!reaper.isReaped()) {
      handle.terminate();
      await reaper.reap();
    }
  }
};
