/**
 * Workspace Cleanup Script
 * Removes orphaned conversion workspaces.
 *
 * Usage: npm run cleanup -- [maxAgeHours]
 */

import "dotenv/config";
import { WORKSPACE_MAX_AGE_HOURS, WORKSPACE_ROOT } from "../config/env.js";
import { cleanupStaleWorkspaces } from "../utils/cleanupTemp.js";

async function cleanupWorkspaces() {
  const arg = process.argv[2];
  const maxAgeHours = arg ? Number(arg) : WORKSPACE_MAX_AGE_HOURS;
  if (!Number.isFinite(maxAgeHours) || maxAgeHours < 0) {
    throw new Error(`maxAgeHours must be a non-negative number, got '${arg}'`);
  }

  console.log(`[cleanup] Sweeping ${WORKSPACE_ROOT} (older than ${maxAgeHours}h)...`);
  const { removedDirs } = await cleanupStaleWorkspaces(WORKSPACE_ROOT, maxAgeHours);
  console.log(`[cleanup] Done, ${removedDirs} removed`);
}

cleanupWorkspaces().catch((error: unknown) => {
  console.error("[cleanup] Failed:", error);
  process.exit(1);
});
