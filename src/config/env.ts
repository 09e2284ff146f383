/**
 * Environment Configuration
 * Exports type-safe environment variables with defaults.
 * Fails fast at startup if a numeric variable is malformed.
 */

import os from "os";
import path from "path";

/** Server configuration */
export const PORT = readIntEnv("PORT", 3000);
export const NODE_ENV = process.env.NODE_ENV || "development";

/** Workspaces live under <TMP_DIR>/audio-converter, one directory per request */
export const WORKSPACE_ROOT = path.join(process.env.TMP_DIR || os.tmpdir(), "audio-converter");
/** Orphaned workspaces older than this are swept at startup */
export const WORKSPACE_MAX_AGE_HOURS = readIntEnv("WORKSPACE_MAX_AGE_HOURS", 24);

/** Optional explicit ffmpeg binary (otherwise resolved from PATH) */
export const FFMPEG_PATH = process.env.FFMPEG_PATH;
/** Wall-clock limit for one ffmpeg run, 0 disables it */
export const CONVERSION_TIMEOUT_SECONDS = readIntEnv("CONVERSION_TIMEOUT_SECONDS", 300);

/** Remote download limits */
export const MAX_DOWNLOAD_MB = readIntEnv("MAX_DOWNLOAD_MB", 200);
export const HEAD_TIMEOUT_MS = readIntEnv("HEAD_TIMEOUT_MS", 10_000);
export const DOWNLOAD_TIMEOUT_MS = readIntEnv("DOWNLOAD_TIMEOUT_MS", 30_000);

/** Metadata lookups against platform APIs */
export const METADATA_TIMEOUT_MS = readIntEnv("METADATA_TIMEOUT_MS", 10_000);

/**
 * Reads a non-negative integer variable.
 * Throws immediately if the value is set but not a number.
 */
function readIntEnv(key: string, fallback: number): number {
  const raw = process.env[key];
  if (!raw) return fallback;

  const value = parseInt(raw, 10);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`Environment variable ${key} must be a non-negative integer, got '${raw}'`);
  }
  return value;
}
