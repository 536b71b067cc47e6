// =============================================================================
// NodeWorkspaceAdapter — Workspace file I/O confined to the workspace root
// =============================================================================

import { constants } from "node:fs";
import { lstat, mkdir, readFile, realpath, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";

import { WorkspaceAccessError } from "../../errors.js";
import type { WorkspacePort } from "../../ports/host-services.port.js";
import { isPathInside } from "../../utils/paths.js";

export class NodeWorkspaceAdapter implements WorkspacePort {
  readonly rootPath: string;

  constructor(rootPath: string) {
    this.rootPath = resolve(rootPath);
  }

  async readFile(path: string): Promise<string> {
    const target = await this.confine(path);
    return readFile(target, "utf-8");
  }

  /** Creates missing parent directories only after the existing part of the path checks out. */
  async writeFile(path: string, content: string): Promise<void> {
    const target = this.resolveLexically(path);
    const parent = dirname(target);
    await this.assertRealPathInside(path, await nearestExisting(parent));
    await mkdir(parent, { recursive: true });
    await this.assertRealPathInside(path, parent);

    if (await isSymlink(target)) {
      throw new WorkspaceAccessError(path, "refusing to write through a symbolic link");
    }
    await writeFile(target, content, {
      encoding: "utf-8",
      flag: constants.O_WRONLY | constants.O_CREAT | constants.O_TRUNC | constants.O_NOFOLLOW,
    });
  }

  // ─── Private ────────────────────────────────────────────────────────────

  private resolveLexically(path: string): string {
    const target = resolve(this.rootPath, path);
    if (!isPathInside(this.rootPath, target)) {
      throw new WorkspaceAccessError(path, "path escapes the workspace root");
    }
    return target;
  }

  /** Resolves symlinks too, so a link inside the workspace cannot point outside it */
  private async confine(path: string): Promise<string> {
    const target = this.resolveLexically(path);
    await this.assertRealPathInside(path, target);
    return target;
  }

  private async assertRealPathInside(path: string, target: string): Promise<void> {
    const [realRoot, realTarget] = await Promise.all([realpath(this.rootPath), realpath(target)]);
    if (!isPathInside(realRoot, realTarget)) {
      throw new WorkspaceAccessError(path, "path resolves outside the workspace root");
    }
  }
}

async function nearestExisting(dir: string): Promise<string> {
  let current = dir;
  for (;;) {
    try {
      await lstat(current);
      return current;
    } catch (err) {
      const parent = dirname(current);
      if (!isMissingFile(err) || parent === current) throw err;
      current = parent;
    }
  }
}

async function isSymlink(path: string): Promise<boolean> {
  try {
    return (await lstat(path)).isSymbolicLink();
  } catch (err) {
    if (isMissingFile(err)) return false;
    throw err;
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
