import { stat } from "node:fs/promises";
import { parseDurationOutput, runDurationProbe } from "@/system/ffprobe";
import { sanitizePath } from "@/system/path";
import type { CommandOutput, ExecuteCommand } from "@/system/shellCommand";
import makeDebug from "@/utils/debug";

export type VerificationFailure =
  | "missing"
  | "empty"
  | "probe-failed"
  | "invalid-container"
  | "unparseable-duration"
  | "zero-duration";

export type VerificationResult =
  | { ok: true; sizeBytes: number; durationSeconds?: number }
  | { ok: false; reason: VerificationFailure; message: string };

type VerifyOptions = {
  execute?: ExecuteCommand;
};

const debug = makeDebug("system:verify");

const fail = (reason: VerificationFailure, message: string): VerificationResult => {
  debug("%s: %s", reason, message);
  return { ok: false, reason, message };
};

// Existence and size only. Used for outputs ffprobe reports no duration for.
export const checkArtifactFile = async (
  filePath: string
): Promise<VerificationResult> => {
  const target = sanitizePath(filePath);
  if (!target) {
    return fail("missing", "No output path was given.");
  }
  try {
    const info = await stat(target);
    if (!info.isFile()) {
      return fail("missing", `Output path is not a file: ${target}`);
    }
    if (info.size === 0) {
      return fail("empty", `The output file is empty: ${target}`);
    }
    return { ok: true, sizeBytes: info.size };
  } catch (error) {
    debug("stat failed: %O", error);
    return fail("missing", `Could not access the output file: ${target}`);
  }
};

// Confirms the file holds a media container with a positive duration.
export const verifyArtifact = async (
  filePath: string,
  options: VerifyOptions = {}
): Promise<VerificationResult> => {
  const fileCheck = await checkArtifactFile(filePath);
  if (!fileCheck.ok) {
    return fileCheck;
  }

  let output: CommandOutput;
  try {
    output = await runDurationProbe(filePath, options.execute);
  } catch (error) {
    debug("ffprobe could not run: %O", error);
    return fail("probe-failed", "Failed to run ffprobe on the output file.");
  }

  if (output.code !== 0) {
    return fail(
      "invalid-container",
      "The output file does not appear to be a valid video file."
    );
  }

  const durationSeconds = parseDurationOutput(output.stdout);
  if (durationSeconds === undefined) {
    return fail("unparseable-duration", "Could not determine the video duration.");
  }
  if (durationSeconds <= 0) {
    return fail("zero-duration", "The video file has zero duration.");
  }

  debug("verified %s: %d bytes, %ds", filePath, fileCheck.sizeBytes, durationSeconds);
  return { ok: true, sizeBytes: fileCheck.sizeBytes, durationSeconds };
};

export const verify = async (filePath: string, options: VerifyOptions = {}) =>
  (await verifyArtifact(filePath, options)).ok;
