/**
 * Application Initialization
 * Points fluent-ffmpeg at its binary and prepares the workspace root.
 */

import { mkdir } from "fs/promises";
import ffmpeg from "fluent-ffmpeg";
import { cleanupStaleWorkspaces } from "../utils/cleanupTemp.js";

export interface InitOptions {
  workspaceRoot: string;
  workspaceMaxAgeHours: number;
  ffmpegPath?: string;
}

/**
 * Initializes application dependencies on startup.
 */
export async function initializeApp(options: InitOptions): Promise<void> {
  console.log("Initializing application...");

  try {
    if (options.ffmpegPath) {
      ffmpeg.setFfmpegPath(options.ffmpegPath);
      console.log(`✓ Using ffmpeg at ${options.ffmpegPath}`);
    }

    await mkdir(options.workspaceRoot, { recursive: true });
    await cleanupStaleWorkspaces(options.workspaceRoot, options.workspaceMaxAgeHours);

    console.log("✓ Application initialized successfully\n");
  } catch (error) {
    console.error("✗ Application initialization failed:", error);
    throw error;
  }
}
