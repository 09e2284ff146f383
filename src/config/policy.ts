/**
 * Acquisition Policy
 * Rules applied to remote audio sources: blocked platforms, accepted
 * content types, byte cap and network timeouts.
 */

import {
  DOWNLOAD_TIMEOUT_MS,
  HEAD_TIMEOUT_MS,
  MAX_DOWNLOAD_MB,
} from "./env.js";

export interface AcquisitionPolicy {
  /** Exact lowercase hostnames that are never fetched */
  readonly blockedHosts: ReadonlySet<string>;
  /** Declared Content-Type must start with one of these */
  readonly allowedContentPrefixes: readonly string[];
  /** Hard cap on received bytes, enforced while streaming */
  readonly maxBytes: number;
  readonly headTimeoutMs: number;
  /** Time allowed for the GET response headers to arrive */
  readonly downloadTimeoutMs: number;
}

/** Streaming platforms audio is never downloaded from (metadata lookup is still allowed). */
export const BLOCKED_HOSTS: ReadonlySet<string> = new Set([
  "open.spotify.com",
  "spotify.link",
  "music.apple.com",
  "itunes.apple.com",
  "youtube.com",
  "www.youtube.com",
  "m.youtube.com",
  "youtu.be",
  "soundcloud.com",
  "m.soundcloud.com",
  "api.soundcloud.com",
]);

export const ALLOWED_CONTENT_PREFIXES: readonly string[] = ["audio/"];

/**
 * Builds a frozen policy, filling anything not given from the environment.
 */
export function createAcquisitionPolicy(overrides: Partial<AcquisitionPolicy> = {}): AcquisitionPolicy {
  return Object.freeze({
    blockedHosts: overrides.blockedHosts ?? BLOCKED_HOSTS,
    allowedContentPrefixes: overrides.allowedContentPrefixes ?? ALLOWED_CONTENT_PREFIXES,
    maxBytes: overrides.maxBytes ?? MAX_DOWNLOAD_MB * 1024 * 1024,
    headTimeoutMs: overrides.headTimeoutMs ?? HEAD_TIMEOUT_MS,
    downloadTimeoutMs: overrides.downloadTimeoutMs ?? DOWNLOAD_TIMEOUT_MS,
  });
}
