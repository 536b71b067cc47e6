import { access, mkdir, readFile, rm, symlink, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { WorkspaceAccessError } from "../../../errors.js";
import { createTempDir } from "../../../testing/plugin-fixtures.js";
import { NodeWorkspaceAdapter } from "../node-workspace.adapter.js";

describe("NodeWorkspaceAdapter", () => {
  let root: string;
  let workspaceRoot: string;
  let workspace: NodeWorkspaceAdapter;

  beforeEach(async () => {
    root = await createTempDir();
    workspaceRoot = join(root, "ws");
    await mkdir(workspaceRoot);
    workspace = new NodeWorkspaceAdapter(workspaceRoot);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("writes nested files and reads them back", async () => {
    await workspace.writeFile("src/deep/a.ts", "export const a = 1;\n");

    expect(await readFile(join(workspaceRoot, "src", "deep", "a.ts"), "utf-8")).toBe("export const a = 1;\n");
    await expect(workspace.readFile("src/deep/a.ts")).resolves.toBe("export const a = 1;\n");
  });

  it.each(["../outside.txt", "src/../../outside.txt", "/etc/hostname"])("refuses %s", async (path) => {
    await expect(workspace.readFile(path)).rejects.toThrow(
      `Workspace access denied for "${path}": path escapes the workspace root`,
    );
    await expect(workspace.writeFile(path, "x")).rejects.toBeInstanceOf(WorkspaceAccessError);
  });

  it("refuses to read through a link that leaves the workspace", async () => {
    const outside = join(root, "secret.txt");
    await writeFile(outside, "test-secret", "utf-8");
    await symlink(outside, join(workspaceRoot, "link.txt"));

    await expect(workspace.readFile("link.txt")).rejects.toThrow(
      'Workspace access denied for "link.txt": path resolves outside the workspace root',
    );
  });

  it("refuses to write into a linked directory outside the workspace", async () => {
    const outsideDir = join(root, "elsewhere");
    await mkdir(outsideDir);
    await symlink(outsideDir, join(workspaceRoot, "out"));

    await expect(workspace.writeFile("out/x.txt", "x")).rejects.toBeInstanceOf(WorkspaceAccessError);
    await expect(readFile(join(outsideDir, "x.txt"), "utf-8")).rejects.toThrow();
  });

  it("refuses to write through a file link that leaves the workspace", async () => {
    const outside = join(root, "secret.txt");
    await writeFile(outside, "test-secret", "utf-8");
    await symlink(outside, join(workspaceRoot, "link.txt"));

    await expect(workspace.writeFile("link.txt", "overwritten")).rejects.toThrow(
      'Workspace access denied for "link.txt": refusing to write through a symbolic link',
    );
    expect(await readFile(outside, "utf-8")).toBe("test-secret");
  });

  it("refuses a file link even when its target is inside the workspace", async () => {
    await writeFile(join(workspaceRoot, "real.txt"), "original", "utf-8");
    await symlink(join(workspaceRoot, "real.txt"), join(workspaceRoot, "alias.txt"));

    await expect(workspace.writeFile("alias.txt", "x")).rejects.toBeInstanceOf(WorkspaceAccessError);
    expect(await readFile(join(workspaceRoot, "real.txt"), "utf-8")).toBe("original");
  });

  it("creates no directories outside the workspace before refusing", async () => {
    const outsideDir = join(root, "elsewhere");
    await mkdir(outsideDir);
    await symlink(outsideDir, join(workspaceRoot, "out"));

    await expect(workspace.writeFile("out/new/deeper/x.txt", "x")).rejects.toThrow(
      'Workspace access denied for "out/new/deeper/x.txt": path resolves outside the workspace root',
    );
    await expect(access(join(outsideDir, "new"))).rejects.toThrow();
  });
});
