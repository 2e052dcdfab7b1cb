import { access } from "node:fs/promises";
import { sanitizePath } from "@/system/path";

// Checks whether a filesystem path exists on disk.
export const pathExists = async (path: string) => {
  const trimmed = sanitizePath(path);
  if (!trimmed) {
    return false;
  }
  try {
    await access(trimmed);
    return true;
  } catch {
    return false;
  }
};
