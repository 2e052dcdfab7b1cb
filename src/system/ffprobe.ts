import { executeCommand, type ExecuteCommand } from "@/system/shellCommand";
import { sanitizePath } from "@/system/path";
import makeDebug from "@/utils/debug";

const debug = makeDebug("system:ffprobe");

export const FFPROBE_PROGRAM = "ffprobe";

// Container duration as a single bare number on stdout.
export const buildDurationProbeArgs = (filePath: string) => [
  "-v",
  "error",
  "-show_entries",
  "format=duration",
  "-of",
  "default=noprint_wrappers=1:nokey=1",
  "--",
  filePath
];

export const parseDurationOutput = (stdout: string) => {
  const trimmed = stdout.trim();
  if (!trimmed) {
    return undefined;
  }
  // Number() rejects trailing junk such as "N/A" that parseFloat would half-accept.
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : undefined;
};

export const runDurationProbe = async (
  filePath: string,
  execute: ExecuteCommand = executeCommand
) => {
  const normalizedPath = sanitizePath(filePath);
  if (!normalizedPath) {
    throw new Error("ffprobe received an empty file path.");
  }
  const args = buildDurationProbeArgs(normalizedPath);
  debug("ffprobe args: %o", args);
  return execute(FFPROBE_PROGRAM, args);
};

// Best-effort duration lookup; undefined when ffprobe fails or reports nothing usable.
export const probeDurationSeconds = async (
  filePath: string,
  execute: ExecuteCommand = executeCommand
) => {
  try {
    const output = await runDurationProbe(filePath, execute);
    if (output.code !== 0) {
      debug("duration probe failed: code=%s raw=%s", output.code, output.stderr.slice(-1500));
      return undefined;
    }
    const duration = parseDurationOutput(output.stdout);
    return duration !== undefined && duration > 0 ? duration : undefined;
  } catch (error) {
    debug("duration probe error: %O", error);
    return undefined;
  }
};
