// Argument vectors for capture, test capture and GIF conversion jobs.
import type { CaptureSource } from "@/config/capture";
import { TEST_CAPTURE_SECONDS } from "@/config/app";
import type { JobParameters } from "@/jobs/types";
import { guardLeadingDash } from "@/system/path";

export type EncodePreset = {
  speed: "ultrafast" | "veryfast" | "medium" | "slow";
  crf: number;
};

export const CAPTURE_PRESET: EncodePreset = { speed: "medium", crf: 23 };
// Trades quality for speed; the test only proves the pipeline works.
export const TEST_CAPTURE_PRESET: EncodePreset = { speed: "ultrafast", crf: 28 };
export const TEST_CAPTURE_FPS = 30;

// Two-pass palette keeps GIF colours close to the source at 10 fps, 640 px wide.
export const GIF_FILTER =
  "fps=10,scale=640:-1:flags=lanczos,split[s0][s1];[s0]palettegen[p];[s1][p]paletteuse";

const buildCaptureInputArgs = (capture: CaptureSource, fps: number) => [
  "-f",
  capture.format,
  "-framerate",
  String(fps),
  "-i",
  capture.input,
  ...capture.postInputArgs
];

const buildEncodeArgs = (preset: EncodePreset) => [
  "-c:v",
  "libx264",
  "-pix_fmt",
  "yuv420p",
  "-preset",
  preset.speed,
  "-crf",
  String(preset.crf)
];

export const buildCaptureArgs = (
  params: Pick<JobParameters, "outputPath" | "durationSeconds" | "fps">,
  capture: CaptureSource,
  preset: EncodePreset = CAPTURE_PRESET
) => {
  const args = [
    "-y",
    "-hide_banner",
    ...buildCaptureInputArgs(capture, params.fps),
    ...buildEncodeArgs(preset)
  ];
  if (params.durationSeconds > 0) {
    args.push("-t", String(params.durationSeconds));
  }
  args.push(guardLeadingDash(params.outputPath));
  return args;
};

export const buildTestCaptureArgs = (outputPath: string, capture: CaptureSource) =>
  buildCaptureArgs(
    { outputPath, durationSeconds: TEST_CAPTURE_SECONDS, fps: TEST_CAPTURE_FPS },
    capture,
    TEST_CAPTURE_PRESET
  );

export const buildGifArgs = (inputPath: string, outputPath: string) => [
  "-y",
  "-hide_banner",
  "-i",
  guardLeadingDash(inputPath),
  "-vf",
  GIF_FILTER,
  "-loop",
  "0",
  guardLeadingDash(outputPath)
];

// Lists avfoundation devices; ffmpeg prints them on stderr and exits non-zero.
export const LIST_AVFOUNDATION_DEVICES_ARGS = [
  "-hide_banner",
  "-f",
  "avfoundation",
  "-list_devices",
  "true",
  "-i",
  ""
];
