// Shared path helpers for shell and ffmpeg interactions.

export const sanitizePath = (value: string) =>
  value.trim().replace(/^"+|"+$/g, "");

// Keeps a path that starts with "-" from being read as an ffmpeg option.
export const guardLeadingDash = (value: string) =>
  value.startsWith("-") ? `./${value}` : value;

// Normalizes separators for comparisons without hitting the filesystem.
const normalizePathForCompare = (value: string) =>
  sanitizePath(value).replace(/[/\\]+/g, "/").replace(/\/+$/, "");

// Compares two paths, case-insensitively on Windows.
export const pathsMatch = (
  left: string,
  right: string,
  platform: NodeJS.Platform = process.platform
) => {
  const normalizedLeft = normalizePathForCompare(left);
  const normalizedRight = normalizePathForCompare(right);
  if (!normalizedLeft || !normalizedRight) {
    return false;
  }
  if (platform === "win32") {
    return normalizedLeft.toLowerCase() === normalizedRight.toLowerCase();
  }
  return normalizedLeft === normalizedRight;
};
