import { LIST_AVFOUNDATION_DEVICES_ARGS } from "@/jobs/ffmpegArgs";
import { formatError } from "@/jobs/errors";
import { executeCommand, type ExecuteCommand } from "@/system/shellCommand";
import makeDebug from "@/utils/debug";

const debug = makeDebug("system:devices");

export const filterDeviceLines = (output: string) =>
  output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.includes("AVFoundation") || line.includes("capture"));

// Lists macOS capture devices to help pick a screen index. Empty when ffmpeg cannot run.
export const listCaptureDevices = async (execute: ExecuteCommand = executeCommand) => {
  try {
    const output = await execute("ffmpeg", LIST_AVFOUNDATION_DEVICES_ARGS);
    return filterDeviceLines(output.stderr);
  } catch (error) {
    debug("device listing failed: %s", formatError(error));
    return [];
  }
};
