// Output path helpers for default capture names and follow-on conversion paths.
import { tmpdir } from "node:os";
import path from "node:path";
import { TEST_CAPTURE_FILE_NAME } from "@/config/app";
import { sanitizePath } from "@/system/path";
import type { FollowOn } from "@/jobs/types";

const getSeparator = (value: string) => (value.includes("\\") ? "\\" : "/");

export type OutputPathParts = {
  folder: string;
  fileName: string;
  separator: string;
};

// Splits a full output path into folder + filename segments.
export const splitOutputPath = (outputPath: string): OutputPathParts => {
  const cleanPath = sanitizePath(outputPath);
  const separator = getSeparator(cleanPath);
  const parts = cleanPath.split(/[/\\]/);
  const fileName = parts.pop() ?? "";
  const folder = parts.length > 0 ? parts.join(separator) : "";

  return {
    folder,
    fileName,
    separator
  };
};

// Swaps (or adds) the extension on a file name.
export const replaceExtension = (fileName: string, extension: string) => {
  const cleanFile = sanitizePath(fileName);
  if (!cleanFile) {
    return cleanFile;
  }
  const normalizedExtension = extension.startsWith(".")
    ? extension
    : `.${extension}`;
  const dotIndex = cleanFile.lastIndexOf(".");
  if (dotIndex <= 0) {
    return `${cleanFile}${normalizedExtension}`;
  }
  return `${cleanFile.slice(0, dotIndex)}${normalizedExtension}`;
};

const pad = (value: number) => value.toString().padStart(2, "0");

// recording_YYYYMMDD_HHMMSS.mp4 in local time.
export const buildDefaultRecordingName = (date: Date = new Date()) => {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `recording_${day}_${time}.mp4`;
};

export const buildTestOutputPath = (directory: string = tmpdir()) =>
  path.join(directory, TEST_CAPTURE_FILE_NAME);

// A finished capture becomes the suggested GIF conversion input, next to its .gif twin.
export const deriveFollowOn = (outputPath: string): FollowOn => {
  const conversionInputPath = sanitizePath(outputPath);
  const { fileName } = splitOutputPath(conversionInputPath);
  const folderPrefix = conversionInputPath.slice(
    0,
    conversionInputPath.length - fileName.length
  );
  return {
    conversionInputPath,
    conversionOutputPath: `${folderPrefix}${replaceExtension(fileName, ".gif")}`
  };
};
