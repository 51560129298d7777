import { existsSync } from "fs";
import { mkdir, mkdtemp, readdir, rm, utimes, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { cleanupStaleWorkspaces, withTempWorkspace } from "../src/utils/tempWorkspace.js";

describe("withTempWorkspace", () => {
  let rootDir: string;

  beforeEach(async () => {
    rootDir = await mkdtemp(path.join(os.tmpdir(), "workspace-test-"));
  });

  afterEach(async () => {
    await rm(rootDir, { recursive: true, force: true });
  });

  it("runs in a fresh directory and removes it afterwards", async () => {
    let seen = "";

    const result = await withTempWorkspace(rootDir, async (workDir) => {
      seen = workDir;
      await writeFile(path.join(workDir, "audio.mp3"), "data");
      return "done";
    });

    expect(result).toBe("done");
    expect(path.dirname(seen)).toBe(rootDir);
    expect(path.basename(seen).startsWith("req-")).toBe(true);
    expect(existsSync(seen)).toBe(false);
  });

  it("removes the directory when the callback throws", async () => {
    let seen = "";

    await expect(
      withTempWorkspace(rootDir, async (workDir) => {
        seen = workDir;
        await writeFile(path.join(workDir, "partial.m4a"), "data");
        throw new Error("stage failed");
      })
    ).rejects.toThrow("stage failed");

    expect(existsSync(seen)).toBe(false);
    expect(await readdir(rootDir)).toEqual([]);
  });

  it("creates the root directory when it does not exist", async () => {
    const nestedRoot = path.join(rootDir, "nested", "root");

    await withTempWorkspace(nestedRoot, async (workDir) => {
      expect(existsSync(workDir)).toBe(true);
    });

    expect(await readdir(nestedRoot)).toEqual([]);
  });
});

describe("cleanupStaleWorkspaces", () => {
  let rootDir: string;
  const now = new Date("2026-03-01T12:00:00Z").getTime();
  const fiveHoursAgo = new Date(now - 5 * 60 * 60 * 1000);
  const tenMinutesAgo = new Date(now - 10 * 60 * 1000);

  beforeEach(async () => {
    rootDir = await mkdtemp(path.join(os.tmpdir(), "cleanup-test-"));
  });

  afterEach(async () => {
    await rm(rootDir, { recursive: true, force: true });
  });

  async function makeDir(name: string, mtime: Date, content?: string): Promise<string> {
    const dir = path.join(rootDir, name);
    await mkdir(dir);
    if (content !== undefined) {
      await writeFile(path.join(dir, "audio.mp3"), content);
    }
    await utimes(dir, mtime, mtime);
    return dir;
  }

  it("removes only request workspaces older than the limit", async () => {
    await makeDir("req-old", fiveHoursAgo, "0123456789");
    await makeDir("req-fresh", tenMinutesAgo, "abc");
    await makeDir("unrelated", fiveHoursAgo);

    const summary = await cleanupStaleWorkspaces(rootDir, 2, now);

    expect(summary).toEqual({ removedDirs: 1, freedBytes: 10 });
    expect((await readdir(rootDir)).sort()).toEqual(["req-fresh", "unrelated"]);
  });

  it("does nothing when the root does not exist", async () => {
    const summary = await cleanupStaleWorkspaces(path.join(rootDir, "missing"), 2, now);

    expect(summary).toEqual({ removedDirs: 0, freedBytes: 0 });
  });
});
