import { isCommandAvailable, type AvailabilityCheck } from "@/system/commandAvailability";
import { executeCommand, type ExecuteCommand } from "@/system/shellCommand";
import { formatError } from "@/jobs/errors";
import makeDebug from "@/utils/debug";

export type FfmpegStatus = {
  state: "ready" | "missing";
  message: string;
  details?: string;
  ffmpegVersion?: string;
  ffprobeVersion?: string;
};

type ToolCheckOptions = {
  isAvailable?: AvailabilityCheck;
  execute?: ExecuteCommand;
};

type ProgramResult =
  | { ok: true; version: string }
  | { ok: false; error: string };

const debug = makeDebug("system:ffmpeg");

const getFirstLine = (value: string) =>
  value.split(/\r?\n/).map((line) => line.trim()).find(Boolean) ?? "";

const findVersionLine = (output: string, prefix: string) =>
  output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .find((line) => line.toLowerCase().startsWith(prefix.toLowerCase())) ?? "";

const checkProgram = async (
  program: "ffmpeg" | "ffprobe",
  options: Required<ToolCheckOptions>
): Promise<ProgramResult> => {
  if (!(await options.isAvailable(program))) {
    return { ok: false, error: "not found on PATH" };
  }
  try {
    const output = await options.execute(program, ["-version"]);
    const combinedOutput = [output.stdout, output.stderr].filter(Boolean).join("\n");
    const versionLine = findVersionLine(combinedOutput, `${program} version`);
    if (output.code !== 0 && !versionLine) {
      return { ok: false, error: combinedOutput.trim() || "Exit code error" };
    }
    return { ok: true, version: versionLine || getFirstLine(combinedOutput) };
  } catch (error) {
    return { ok: false, error: formatError(error) };
  }
};

// Checks that both ffmpeg and ffprobe resolve on PATH and answer -version.
export const checkFfmpegTools = async (
  options: ToolCheckOptions = {}
): Promise<FfmpegStatus> => {
  const resolved: Required<ToolCheckOptions> = {
    isAvailable: options.isAvailable ?? ((tool: string) => isCommandAvailable(tool)),
    execute: options.execute ?? executeCommand
  };
  const [ffmpegResult, ffprobeResult] = await Promise.all([
    checkProgram("ffmpeg", resolved),
    checkProgram("ffprobe", resolved)
  ]);

  if (!ffmpegResult.ok || !ffprobeResult.ok) {
    debug("ffmpeg check failed: %o %o", ffmpegResult, ffprobeResult);
    return {
      state: "missing",
      message: "FFmpeg is not installed. Install FFmpeg and make sure it is on PATH.",
      details: [
        !ffmpegResult.ok ? `ffmpeg: ${ffmpegResult.error}` : null,
        !ffprobeResult.ok ? `ffprobe: ${ffprobeResult.error}` : null
      ]
        .filter(Boolean)
        .join(" | ")
    };
  }

  return {
    state: "ready",
    message: "FFmpeg is ready.",
    ffmpegVersion: ffmpegResult.version,
    ffprobeVersion: ffprobeResult.version
  };
};
