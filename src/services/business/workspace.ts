/**
 * Workspace
 * Per-request scratch directory that owns every file the request creates.
 */

import { mkdir, mkdtemp, rm } from "fs/promises";
import path from "path";

export const WORKSPACE_PREFIX = "job-";

export class Workspace {
  private released = false;

  private constructor(public readonly dir: string) {}

  /** Short identifier used in log lines. */
  get id(): string {
    return path.basename(this.dir);
  }

  /**
   * Creates a fresh, uniquely named directory under root.
   */
  static async acquire(root: string): Promise<Workspace> {
    await mkdir(root, { recursive: true });
    const dir = await mkdtemp(path.join(root, WORKSPACE_PREFIX));
    return new Workspace(dir);
  }

  resolve(fileName: string): string {
    return path.join(this.dir, fileName);
  }

  /**
   * Removes the directory and everything in it.
   * Only the first call does anything; failures are logged, never thrown,
   * so they cannot replace the request's own outcome.
   */
  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;

    try {
      await rm(this.dir, { recursive: true, force: true });
    } catch (error) {
      console.warn(`[workspace] Failed to remove ${this.dir}:`, error);
    }
  }
}

/**
 * Runs fn inside a new workspace and releases it on every exit path.
 */
export async function withWorkspace<T>(
  root: string,
  fn: (workspace: Workspace) => Promise<T>
): Promise<T> {
  const workspace = await Workspace.acquire(root);
  try {
    return await fn(workspace);
  } finally {
    await workspace.release();
  }
}
