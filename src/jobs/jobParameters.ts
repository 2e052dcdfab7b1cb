// Parameter checks and mode selection, run before anything is spawned.
import { DEFAULT_FPS, TEST_CAPTURE_SECONDS } from "@/config/app";
import { buildDefaultRecordingName, buildTestOutputPath } from "@/jobs/output";
import { pathsMatch, sanitizePath } from "@/system/path";
import type { JobKind, JobMode, JobParameters } from "@/jobs/types";

export const resolveJobMode = (
  kind: JobKind,
  params: Pick<JobParameters, "durationSeconds">
): JobMode => {
  if (kind === "convert") {
    return "unbounded";
  }
  if (kind === "test") {
    return "bounded";
  }
  return params.durationSeconds > 0 ? "bounded" : "unbounded";
};

// Returns a reason when the parameters cannot describe a runnable job.
export const validateJobParameters = (kind: JobKind, params: JobParameters) => {
  if (!sanitizePath(params.outputPath)) {
    return "Output path must not be empty.";
  }
  if (!Number.isInteger(params.durationSeconds) || params.durationSeconds < 0) {
    return "Duration must be a whole number of seconds, 0 for manual stop.";
  }
  if (!Number.isInteger(params.fps) || params.fps <= 0) {
    return "Frame rate must be a positive whole number.";
  }
  if (kind === "convert") {
    const inputPath = sanitizePath(params.inputPath ?? "");
    if (!inputPath) {
      return "Conversion jobs need an input path.";
    }
    if (pathsMatch(inputPath, params.outputPath)) {
      return "Output path matches the input file. Choose a different output name.";
    }
  }
  return undefined;
};

// Fills kind-specific defaults, cleans paths and freezes the result for the job's lifetime.
export const normalizeJobParameters = (
  kind: JobKind,
  params: Partial<JobParameters>
): Readonly<JobParameters> => {
  const inputPath =
    params.inputPath === undefined ? undefined : sanitizePath(params.inputPath);
  if (kind === "test") {
    return Object.freeze({
      outputPath: sanitizePath(params.outputPath ?? "") || buildTestOutputPath(),
      durationSeconds: TEST_CAPTURE_SECONDS,
      fps: DEFAULT_FPS
    });
  }
  const outputPath = sanitizePath(params.outputPath ?? "");
  return Object.freeze({
    outputPath: kind === "record" ? outputPath || buildDefaultRecordingName() : outputPath,
    durationSeconds: params.durationSeconds ?? 0,
    fps: params.fps ?? DEFAULT_FPS,
    ...(inputPath === undefined ? {} : { inputPath })
  });
};
