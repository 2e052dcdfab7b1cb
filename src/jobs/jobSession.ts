// Tracks one ffmpeg job at a time and exposes start/poll/stop controls to whoever drives the session.
import { randomUUID } from "node:crypto";
import {
  ASSUMED_CONVERSION_SECONDS,
  COMPLETION_HOLD_MS,
  LOG_BUFFER_LIMIT,
  RETAINED_JOB_LIMIT
} from "@/config/app";
import type { CaptureSource } from "@/config/capture";
import { JobBusyError, formatError, type JobErrorCode } from "@/jobs/errors";
import {
  estimateProgress,
  extractOutTime,
  isCompletionLine,
  splitDiagnosticLines
} from "@/jobs/ffmpegProgress";
import { runFfmpegJob, type RunPhase, type RunResult } from "@/jobs/ffmpegRunner";
import {
  normalizeJobParameters,
  resolveJobMode,
  validateJobParameters
} from "@/jobs/jobParameters";
import {
  canTransition,
  createJobStateMachine,
  isActiveState,
  isTerminalState,
  type JobStateMachine
} from "@/jobs/jobStateMachine";
import { createLogChannel, type LogChannel } from "@/jobs/logChannel";
import { deriveFollowOn } from "@/jobs/output";
import type {
  FollowOn,
  JobKind,
  JobMode,
  JobOutcome,
  JobParameters,
  JobProgress,
  JobSnapshot,
  JobState,
  JobToken
} from "@/jobs/types";
import type { AvailabilityCheck } from "@/system/commandAvailability";
import { checkFfmpegTools, type FfmpegStatus } from "@/system/ffmpeg";
import { probeDurationSeconds } from "@/system/ffprobe";
import type { ExecuteCommand, SpawnProcess } from "@/system/shellCommand";
import {
  checkArtifactFile,
  verifyArtifact,
  type VerificationResult
} from "@/system/verifyArtifact";
import formatDuration from "@/utils/formatDuration";
import { elapsedSecondsSince } from "@/utils/time";
import makeDebug from "@/utils/debug";

export type JobSessionOptions = {
  spawnProcess?: SpawnProcess;
  execute?: ExecuteCommand;
  isAvailable?: AvailabilityCheck;
  inputExists?: (path: string) => Promise<boolean>;
  capture?: CaptureSource;
  verifyOutput?: (kind: JobKind, outputPath: string) => Promise<VerificationResult>;
  probeDuration?: (path: string) => Promise<number | undefined>;
  pollIntervalMs?: number;
  graceMs?: number;
  // How long current() keeps pointing at a finished job.
  completionHoldMs?: number;
  // Unbounded jobs only: stop automatically after this long.
  jobTimeoutMs?: number;
  // Finished jobs kept for snapshots and outcomes; older ones are forgotten.
  retainedJobs?: number;
  createToken?: () => JobToken;
  onTransition?: (token: JobToken, next: JobState, previous: JobState) => void;
  onCompleted?: (snapshot: JobSnapshot) => void;
};

export type JobSession = {
  // Tool check taken when the session was created.
  status: () => FfmpegStatus;
  startJob: (kind: JobKind, params?: Partial<JobParameters>) => JobToken;
  // Drains diagnostic lines queued since the last poll and folds them into progress.
  poll: (token: JobToken) => string[];
  requestStop: (token: JobToken) => void;
  isTerminal: (token: JobToken) => JobOutcome | undefined;
  getSnapshot: (token: JobToken) => JobSnapshot | undefined;
  current: () => JobToken | undefined;
  // Follow-on conversion paths from the most recent completed capture.
  followOn: () => FollowOn | undefined;
  settled: (token: JobToken) => Promise<JobOutcome | undefined>;
  shutdown: () => Promise<void>;
};

type JobRecord = {
  token: JobToken;
  kind: JobKind;
  mode: JobMode;
  params: Readonly<JobParameters>;
  machine: JobStateMachine;
  channel: LogChannel<string>;
  // Cleared once the job is terminal.
  controller: AbortController | null;
  startedAt: number;
  endedAt?: number;
  progress: Omit<JobProgress, "elapsedSeconds">;
  // Divisor for time= progress; the probed input length for conversions.
  assumedTotalSeconds: number;
  logBuffer: string[];
  outcome?: JobOutcome;
  followOn?: FollowOn;
};

const debug = makeDebug("jobs:session");

const completionLine = (kind: JobKind, outputPath: string) => {
  switch (kind) {
    case "convert":
      return "GIF conversion completed successfully!";
    case "test":
      return "Test recording completed successfully!";
    default:
      return `Recording completed successfully: ${outputPath}`;
  }
};

const pushBounded = (buffer: string[], lines: string[]) => {
  buffer.push(...lines);
  if (buffer.length > LOG_BUFFER_LIMIT) {
    buffer.splice(0, buffer.length - LOG_BUFFER_LIMIT);
  }
};

export const createJobSession = async (
  options: JobSessionOptions = {}
): Promise<JobSession> => {
  const toolStatus = await checkFfmpegTools({
    isAvailable: options.isAvailable,
    execute: options.execute
  });
  debug("session tools: %s", toolStatus.state);

  const jobs = new Map<JobToken, JobRecord>();
  const outcomes = new Map<JobToken, Promise<JobOutcome>>();
  const holdTimers = new Map<JobToken, ReturnType<typeof setTimeout>>();
  let currentToken: JobToken | undefined;
  let latestFollowOn: FollowOn | undefined;

  const completionHoldMs = options.completionHoldMs ?? COMPLETION_HOLD_MS;
  const retainedJobs = Math.max(0, options.retainedJobs ?? RETAINED_JOB_LIMIT);
  const createToken = options.createToken ?? (() => randomUUID());
  const verifyOutput =
    options.verifyOutput ??
    ((kind: JobKind, outputPath: string) =>
      // GIFs may report no container duration, so conversions only need a non-empty file.
      kind === "convert"
        ? checkArtifactFile(outputPath)
        : verifyArtifact(outputPath, { execute: options.execute }));
  const probeDuration =
    options.probeDuration ?? ((path: string) => probeDurationSeconds(path, options.execute));

  const snapshotOf = (record: JobRecord): JobSnapshot => {
    const elapsedSeconds = elapsedSecondsSince(record.startedAt, record.endedAt ?? Date.now());
    return {
      token: record.token,
      kind: record.kind,
      mode: record.mode,
      state: record.machine.state(),
      params: record.params,
      progress: { ...record.progress, elapsedSeconds },
      elapsedLabel: formatDuration(elapsedSeconds),
      logTail: [...record.logBuffer],
      outcome: record.outcome,
      followOn: record.followOn
    };
  };

  const scheduleRelease = (token: JobToken) => {
    const timer = setTimeout(() => {
      holdTimers.delete(token);
      if (currentToken === token) {
        debug("releasing %s", token);
        currentToken = undefined;
      }
    }, completionHoldMs);
    timer.unref();
    holdTimers.set(token, timer);
  };

  const forget = (token: JobToken) => {
    jobs.delete(token);
    outcomes.delete(token);
    const timer = holdTimers.get(token);
    if (timer) {
      clearTimeout(timer);
      holdTimers.delete(token);
    }
  };

  // Map order is start order, so the oldest finished jobs go first.
  const evictSettled = () => {
    const finished = [...jobs.values()]
      .filter((record) => record.outcome && record.token !== currentToken)
      .map((record) => record.token);
    const excess = finished.length - retainedJobs;
    if (excess > 0) {
      debug("forgetting %d finished jobs", excess);
      finished.slice(0, excess).forEach(forget);
    }
  };

  const settle = (record: JobRecord, outcome: JobOutcome) => {
    record.outcome = outcome;
    record.endedAt = Date.now();
    record.controller = null;
    record.channel.close();
    scheduleRelease(record.token);
    evictSettled();
    return outcome;
  };

  const fail = (record: JobRecord, error: JobErrorCode, reason: string): JobOutcome => {
    const state = record.machine.state();
    if (!canTransition(state, "failed")) {
      debug("job %s already %s, dropping failure: %s", record.token, state, reason);
      return record.outcome ?? { state: "failed", error, reason };
    }
    record.machine.transition("failed");
    debug("job %s failed (%s): %s", record.token, error, reason);
    return settle(record, { state: "failed", error, reason });
  };

  const complete = (record: JobRecord): JobOutcome => {
    record.machine.transition("completed");
    if (record.kind === "record") {
      record.followOn = deriveFollowOn(record.params.outputPath);
      latestFollowOn = record.followOn;
    }
    const outcome = settle(record, {
      state: "completed",
      outputPath: record.params.outputPath
    });
    try {
      options.onCompleted?.(snapshotOf(record));
    } catch (error) {
      debug("completion callback failed: %O", error);
    }
    return outcome;
  };

  const onPhase = (record: JobRecord) => (phase: RunPhase) => {
    if (canTransition(record.machine.state(), phase)) {
      record.machine.transition(phase);
    }
  };

  const assumedTotalFor = async (record: JobRecord) => {
    if (record.kind !== "convert") {
      return record.params.durationSeconds;
    }
    const probed = await probeDuration(record.params.inputPath ?? "");
    return probed ?? ASSUMED_CONVERSION_SECONDS;
  };

  const finishRun = async (record: JobRecord, result: RunResult): Promise<JobOutcome> => {
    if (!result.ok) {
      return fail(record, result.error.code, result.error.message);
    }
    record.machine.transition("verifying");
    const verification = await verifyOutput(record.kind, record.params.outputPath);
    if (!verification.ok) {
      record.channel.send(verification.message);
      return fail(record, "VerificationFailed", verification.message);
    }
    record.channel.send(completionLine(record.kind, record.params.outputPath));
    record.channel.send(`Saved to ${record.params.outputPath}`);
    return complete(record);
  };

  const run = async (record: JobRecord, controller: AbortController) => {
    record.assumedTotalSeconds = await assumedTotalFor(record);
    let timeout: ReturnType<typeof setTimeout> | undefined;
    if (record.mode === "unbounded" && options.jobTimeoutMs !== undefined) {
      timeout = setTimeout(() => {
        debug("job %s hit its %dms limit", record.token, options.jobTimeoutMs);
        controller.abort();
      }, options.jobTimeoutMs);
      timeout.unref();
    }
    try {
      const result = await runFfmpegJob(
        { kind: record.kind, params: record.params },
        {
          signal: controller.signal,
          sink: record.channel.send,
          onPhase: onPhase(record),
          spawnProcess: options.spawnProcess,
          execute: options.execute,
          isAvailable: options.isAvailable,
          inputExists: options.inputExists,
          capture: options.capture,
          pollIntervalMs: options.pollIntervalMs,
          graceMs: options.graceMs
        }
      );
      return await finishRun(record, result);
    } finally {
      if (timeout) {
        clearTimeout(timeout);
      }
    }
  };

  const startJob = (kind: JobKind, partial: Partial<JobParameters> = {}) => {
    const active = currentToken ? jobs.get(currentToken) : undefined;
    if (active && isActiveState(active.machine.state())) {
      throw new JobBusyError(active.token);
    }

    const token = createToken();
    const params = normalizeJobParameters(kind, partial);
    const machine = createJobStateMachine((next, previous) => {
      debug("job %s: %s -> %s", token, previous, next);
      options.onTransition?.(token, next, previous);
    });
    const channel = createLogChannel<string>();
    const controller = new AbortController();
    const record: JobRecord = {
      token,
      kind,
      mode: resolveJobMode(kind, params),
      params,
      machine,
      channel,
      controller,
      startedAt: Date.now(),
      progress: { ratio: 0 },
      assumedTotalSeconds: 0,
      logBuffer: []
    };
    jobs.set(token, record);
    const previousHold = currentToken ? holdTimers.get(currentToken) : undefined;
    if (previousHold) {
      clearTimeout(previousHold);
    }
    currentToken = token;
    machine.transition("starting");
    debug("startJob %s: kind=%s params=%o", token, kind, params);

    const invalid = validateJobParameters(kind, params);
    if (invalid) {
      channel.send(invalid);
      outcomes.set(token, Promise.resolve(fail(record, "InvalidParameters", invalid)));
      return token;
    }
    if (toolStatus.state !== "ready") {
      const message = "FFmpeg is not installed. Please install FFmpeg first.";
      channel.send(message);
      outcomes.set(token, Promise.resolve(fail(record, "ToolUnavailable", message)));
      return token;
    }

    outcomes.set(
      token,
      run(record, controller).catch((error: unknown) => {
        debug("job %s crashed: %O", token, error);
        return fail(record, "ProcessFailed", formatError(error));
      })
    );
    return token;
  };

  const poll = (token: JobToken) => {
    const record = jobs.get(token);
    if (!record) {
      return [];
    }
    const lines = record.channel.drain().flatMap(splitDiagnosticLines);
    if (lines.length === 0) {
      return lines;
    }
    pushBounded(record.logBuffer, lines);
    for (const line of lines) {
      if (isCompletionLine(line)) {
        record.progress = { ...record.progress, ratio: 1 };
        continue;
      }
      const ratio = estimateProgress(line, record.assumedTotalSeconds);
      if (ratio !== undefined && record.progress.ratio < 1) {
        record.progress = { ratio, outTimeSeconds: extractOutTime(line) };
      }
    }
    return lines;
  };

  const requestStop = (token: JobToken) => {
    const record = jobs.get(token);
    if (!record || isTerminalState(record.machine.state())) {
      return;
    }
    if (record.mode === "bounded") {
      debug("job %s is bounded; stop request ignored", token);
      return;
    }
    debug("stop requested for %s", token);
    record.controller?.abort();
  };

  const isTerminal = (token: JobToken) => {
    const record = jobs.get(token);
    return record && isTerminalState(record.machine.state()) ? record.outcome : undefined;
  };

  const getSnapshot = (token: JobToken) => {
    const record = jobs.get(token);
    return record ? snapshotOf(record) : undefined;
  };

  const settled = async (token: JobToken) => outcomes.get(token);

  const shutdown = async () => {
    const pending = [...jobs.values()].filter((record) => isActiveState(record.machine.state()));
    pending.forEach((record) => record.controller?.abort());
    await Promise.all(pending.map((record) => outcomes.get(record.token)));
    holdTimers.forEach((timer) => clearTimeout(timer));
    holdTimers.clear();
    currentToken = undefined;
  };

  return {
    status: () => toolStatus,
    startJob,
    poll,
    requestStop,
    isTerminal,
    getSnapshot,
    current: () => currentToken,
    followOn: () => latestFollowOn,
    settled,
    shutdown
  };
};
