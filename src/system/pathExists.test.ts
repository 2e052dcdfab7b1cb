import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { pathExists } from "@/system/pathExists";

describe("pathExists", () => {
  let directory = "";

  beforeAll(async () => {
    directory = await mkdtemp(path.join(tmpdir(), "reelcap-exists-"));
    await writeFile(path.join(directory, "clip.mp4"), "data");
  });

  afterAll(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("finds files, including quoted paths", async () => {
    const file = path.join(directory, "clip.mp4");
    await expect(pathExists(file)).resolves.toBe(true);
    await expect(pathExists(`"${file}"`)).resolves.toBe(true);
  });

  it("is false for missing or blank paths", async () => {
    await expect(pathExists(path.join(directory, "gone.mp4"))).resolves.toBe(false);
    await expect(pathExists("   ")).resolves.toBe(false);
  });
});
