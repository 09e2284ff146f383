/**
 * Cleanup utility for orphaned workspaces
 * Requests always release their workspace; anything left under the root
 * was abandoned by a process that died mid-request.
 */

import type { Dirent } from "fs";
import { readdir, rm, stat } from "fs/promises";
import path from "path";
import { WORKSPACE_PREFIX } from "../services/business/workspace.js";

export interface CleanupResult {
  removedDirs: number;
  freedBytes: number;
}

async function directorySize(dir: string): Promise<number> {
  let total = 0;
  for (const entry of await readdir(dir, { withFileTypes: true })) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) total += await directorySize(full);
    else if (entry.isFile()) total += (await stat(full)).size;
  }
  return total;
}

/**
 * Removes workspace directories under root older than maxAgeHours.
 * A missing root means there is nothing to clean.
 */
export async function cleanupStaleWorkspaces(
  root: string,
  maxAgeHours: number = 24,
  now: number = Date.now()
): Promise<CleanupResult> {
  const result: CleanupResult = { removedDirs: 0, freedBytes: 0 };
  const maxAgeMs = maxAgeHours * 60 * 60 * 1000;

  let entries: Dirent[];
  try {
    entries = await readdir(root, { withFileTypes: true });
  } catch {
    console.log(`[cleanup] No workspace root at ${root}, nothing to clean`);
    return result;
  }

  for (const entry of entries) {
    if (!entry.isDirectory() || !entry.name.startsWith(WORKSPACE_PREFIX)) continue;

    const dir = path.join(root, entry.name);
    try {
      const stats = await stat(dir);
      if (now - stats.mtimeMs <= maxAgeMs) continue;

      result.freedBytes += await directorySize(dir);
      await rm(dir, { recursive: true, force: true });
      result.removedDirs++;
      console.log(`[cleanup] Removed stale workspace: ${entry.name} (${((now - stats.mtimeMs) / 3600000).toFixed(1)}h old)`);
    } catch (err) {
      console.warn(`[cleanup] Failed to process ${entry.name}:`, err);
    }
  }

  console.log(`[cleanup] ✓ Removed ${result.removedDirs} workspaces, freed ${(result.freedBytes / (1024 * 1024)).toFixed(1)}MB`);
  return result;
}
