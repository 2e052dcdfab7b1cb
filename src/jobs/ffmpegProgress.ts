// Heuristic progress and completion detection over ffmpeg's free-text stderr.
import { clampRatio } from "@/utils/time";

const TIME_MARKER = "time=";
const BITRATE_MARKER = "bitrate=";

// Parsed progress never reports done; only a completion line does.
export const MAX_ESTIMATED_RATIO = 0.95;

export const COMPLETION_MARKER = "completed successfully";

const parseField = (value: string) => {
  // Number("") is 0, so empty fields need their own check.
  if (!/^\d+(\.\d+)?$/.test(value)) {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
};

// Strict HH:MM:SS(.fraction) to seconds.
export const parseTimecode = (value: string) => {
  const parts = value.split(":");
  if (parts.length !== 3) {
    return undefined;
  }
  const [hours, minutes, seconds] = parts.map(parseField);
  if (hours === undefined || minutes === undefined || seconds === undefined) {
    return undefined;
  }
  return hours * 3600 + minutes * 60 + seconds;
};

// Elapsed media time from a stats line, when it carries both markers.
export const extractOutTime = (line: string) => {
  if (!line.includes(TIME_MARKER) || !line.includes(BITRATE_MARKER)) {
    return undefined;
  }
  const start = line.indexOf(TIME_MARKER) + TIME_MARKER.length;
  const token = line.slice(start).split(/\s/, 1)[0] ?? "";
  return parseTimecode(token);
};

export const estimateProgress = (line: string, assumedTotalSeconds: number) => {
  if (!Number.isFinite(assumedTotalSeconds) || assumedTotalSeconds <= 0) {
    return undefined;
  }
  const outTime = extractOutTime(line);
  if (outTime === undefined) {
    return undefined;
  }
  return clampRatio(outTime / assumedTotalSeconds, MAX_ESTIMATED_RATIO);
};

export const isCompletionLine = (line: string) =>
  line.toLowerCase().includes(COMPLETION_MARKER);

// Blunt failure check for interrupted captures, where the exit code says nothing.
export const hasErrorMarkers = (output: string) =>
  output.includes("Error") && output.includes("error");

// ffmpeg redraws its stats line with \r, so chunks split on both line endings.
export const splitDiagnosticLines = (chunk: string) =>
  chunk
    .split(/\r\n|\r|\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
