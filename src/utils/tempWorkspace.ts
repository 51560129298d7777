/**
 * Temporary workspaces
 * Every request gets its own directory, removed when the request finishes.
 * A startup sweep clears directories left behind by crashes.
 */

import type { Dirent } from "fs";
import { mkdir, mkdtemp, readdir, rm, stat } from "fs/promises";
import path from "path";

const WORKSPACE_PREFIX = "req-";

/**
 * Creates a uniquely named directory under rootDir, runs fn in it,
 * and removes the directory on every exit path.
 */
export async function withTempWorkspace<T>(
  rootDir: string,
  fn: (workDir: string) => Promise<T>
): Promise<T> {
  await mkdir(rootDir, { recursive: true });
  const workDir = await mkdtemp(path.join(rootDir, WORKSPACE_PREFIX));

  try {
    return await fn(workDir);
  } finally {
    await rm(workDir, { recursive: true, force: true }).catch((err) =>
      console.warn(`[cleanup] Failed to remove workspace ${workDir}:`, err)
    );
  }
}

export interface CleanupSummary {
  removedDirs: number;
  freedBytes: number;
}

async function directorySize(dir: string): Promise<number> {
  let total = 0;
  for (const entry of await readdir(dir, { withFileTypes: true })) {
    const entryPath = path.join(dir, entry.name);
    total += entry.isDirectory() ? await directorySize(entryPath) : (await stat(entryPath)).size;
  }
  return total;
}

/**
 * Removes request workspaces under rootDir older than maxAgeHours.
 * Runs once at startup, before any message is handled.
 */
export async function cleanupStaleWorkspaces(
  rootDir: string,
  maxAgeHours: number,
  now: number = Date.now()
): Promise<CleanupSummary> {
  const summary: CleanupSummary = { removedDirs: 0, freedBytes: 0 };

  let entries: Dirent[];
  try {
    entries = await readdir(rootDir, { withFileTypes: true });
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      console.log("[cleanup] No temp directory found, nothing to clean");
      return summary;
    }
    throw error;
  }

  const maxAgeMs = maxAgeHours * 60 * 60 * 1000;

  for (const entry of entries) {
    if (!entry.isDirectory() || !entry.name.startsWith(WORKSPACE_PREFIX)) {
      continue;
    }

    const dir = path.join(rootDir, entry.name);
    try {
      const ageMs = now - (await stat(dir)).mtimeMs;
      if (ageMs <= maxAgeMs) continue;

      summary.freedBytes += await directorySize(dir);
      await rm(dir, { recursive: true, force: true });
      summary.removedDirs++;
      console.log(`[cleanup] Removed stale workspace: ${entry.name} (${(ageMs / 3600000).toFixed(1)}h old)`);
    } catch (err) {
      console.warn(`[cleanup] Failed to process ${entry.name}:`, err);
    }
  }

  console.log(
    `[cleanup] ✓ Removed ${summary.removedDirs} workspaces, freed ${(summary.freedBytes / 1024 / 1024).toFixed(0)}MB`
  );
  return summary;
}
