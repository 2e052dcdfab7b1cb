// Job, progress and outcome types shared across the supervisor and the session.
import type { JobErrorCode } from "@/jobs/errors";

export type JobKind = "record" | "test" | "convert";

// Bounded jobs stop on ffmpeg's own -t limit; unbounded ones wait for a stop request or a natural exit.
export type JobMode = "bounded" | "unbounded";

export type JobParameters = {
  outputPath: string;
  // 0 means record until stopped.
  durationSeconds: number;
  fps: number;
  // Conversion jobs only.
  inputPath?: string;
};

export type JobState =
  | "idle"
  | "starting"
  | "running"
  | "stopping"
  | "verifying"
  | "completed"
  | "failed";

export type TerminalJobState = Extract<JobState, "completed" | "failed">;

export type JobProgress = {
  // 0..1. Parsed output never pushes this past 0.95; only a completion marker reaches 1.
  ratio: number;
  outTimeSeconds?: number;
  elapsedSeconds: number;
};

export type JobOutcome =
  | { state: "completed"; outputPath: string }
  | { state: "failed"; error: JobErrorCode; reason: string };

// Suggested conversion paths seeded after a capture completes.
export type FollowOn = {
  conversionInputPath: string;
  conversionOutputPath: string;
};

export type JobToken = string;

export type JobSnapshot = {
  token: JobToken;
  kind: JobKind;
  mode: JobMode;
  state: JobState;
  params: Readonly<JobParameters>;
  progress: JobProgress;
  // HH:MM:SS since the job started.
  elapsedLabel: string;
  logTail: string[];
  outcome?: JobOutcome;
  followOn?: FollowOn;
};
