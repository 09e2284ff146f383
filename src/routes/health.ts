/**
 * Health Check Routes
 * Liveness and readiness endpoints.
 */

import { Router } from "express";
import { access, constants } from "fs/promises";

export function createHealthRouter(workspaceRoot: string): Router {
  const router = Router();

  /** Process is up. */
  router.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  /** Ready once conversions have somewhere to write. */
  router.get("/ready", async (_req, res) => {
    try {
      await access(workspaceRoot, constants.W_OK);
      res.json({ ready: true });
    } catch {
      res.status(503).json({ ready: false, reason: "workspace root is not writable" });
    }
  });

  return router;
}
