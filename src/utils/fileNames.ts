/**
 * File Name Helpers
 * Naming for files created inside a workspace.
 */

import path from "path";
import { randomBytes } from "crypto";
import type { TargetFormat } from "../types/conversion.js";

export const FALLBACK_EXTENSION = ".bin";

const SAFE_EXTENSION = /^\.[a-z0-9]{1,10}$/i;

/**
 * Extension of a file name or URL path, ".bin" if missing or unusable.
 */
export function extensionOf(nameOrPath: string): string {
  const ext = path.posix.extname(nameOrPath.replace(/\\/g, "/"));
  return SAFE_EXTENSION.test(ext) ? ext : FALLBACK_EXTENSION;
}

/**
 * Unique input file name, e.g. "in_3f9a...c1.mp3".
 */
export function inputFileName(extension: string): string {
  return `in_${randomBytes(16).toString("hex")}${extension}`;
}

/**
 * Output path next to the input, e.g. "in_3f9a.mp3" -> "out_3f9a.wav".
 * The prefix keeps a WAV input from being overwritten by its own output.
 */
export function outputPathFor(inputPath: string, format: TargetFormat): string {
  const stem = path.basename(inputPath, path.extname(inputPath)).replace(/^in_/, "");
  return path.join(path.dirname(inputPath), `out_${stem}.${format}`);
}
