import { mkdtemp, rm } from "node:fs/promises";
import { join } from "node:path";
import { DEBUG } from "./settings.js";

/**
 * Scoped temporary directory owned by one extraction run.
 * Released by withWorkspace on every exit path (return, throw, abort).
 */
export class Workspace {
  private disposed = false;

  private constructor(readonly dir: string) {}

  static async create(root: string): Promise<Workspace> {
    const dir = await mkdtemp(join(root, "coldgrid-"));
    if (DEBUG) console.log("workspace created:", dir);
    return new Workspace(dir);
  }

  /** Absolute path for a file inside the workspace. */
  path(name: string): string {
    return join(this.dir, name);
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    await rm(this.dir, { recursive: true, force: true });
    if (DEBUG) console.log("workspace removed:", this.dir);
  }
}

export async function withWorkspace<T>(root: string, fn: (workspace: Workspace) => Promise<T>): Promise<T> {
  const workspace = await Workspace.create(root);
  try {
    return await fn(workspace);
  } finally {
    await workspace.dispose();
  }
}
