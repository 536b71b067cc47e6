import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createTempDir } from "../../../testing/plugin-fixtures.js";
import { InMemoryEditorAdapter, languageForPath } from "../in-memory-editor.adapter.js";
import { NodeWorkspaceAdapter } from "../node-workspace.adapter.js";

describe("InMemoryEditorAdapter", () => {
  let root: string;
  let editor: InMemoryEditorAdapter;

  beforeEach(async () => {
    root = await createTempDir();
    await mkdir(join(root, "src"));
    await writeFile(join(root, "src", "greet.ts"), "hello world", "utf-8");
    await writeFile(join(root, "notes.md"), "ab\ncd", "utf-8");
    editor = new InMemoryEditorAdapter(new NodeWorkspaceAdapter(root));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("has no active editor until a file is opened", async () => {
    await expect(editor.getActiveEditor()).resolves.toBeUndefined();
    await expect(editor.insertText("x")).rejects.toThrow("No active editor");
  });

  it("opens files from the workspace", async () => {
    await editor.openFile("src/greet.ts");

    await expect(editor.getActiveEditor()).resolves.toEqual({
      filePath: "src/greet.ts",
      language: "typescript",
      text: "hello world",
      selection: undefined,
      cursor: { line: 0, character: 0 },
    });
  });

  it("replaces the selection on insert", async () => {
    await editor.openFile("src/greet.ts");
    editor.setSelection({ line: 0, character: 6 }, { line: 0, character: 11 });
    expect((await editor.getActiveEditor())?.selection).toBe("world");

    await editor.insertText("there");

    const snapshot = await editor.getActiveEditor();
    expect(snapshot?.text).toBe("hello there");
    expect(snapshot?.cursor).toEqual({ line: 0, character: 11 });
    expect(snapshot?.selection).toBeUndefined();
  });

  it("clamps the cursor to the document", async () => {
    await editor.openFile("notes.md");
    editor.setCursor({ line: 5, character: 9 });
    await editor.insertText("!");

    const snapshot = await editor.getActiveEditor();
    expect(snapshot?.text).toBe("ab\ncd!");
    expect(snapshot?.cursor).toEqual({ line: 1, character: 3 });
  });

  it("keeps edits per document and saves the active one", async () => {
    await editor.openFile("notes.md");
    await editor.insertText(">> ");
    await editor.openFile("src/greet.ts");
    await editor.openFile("notes.md");

    expect((await editor.getActiveEditor())?.text).toBe(">> ab\ncd");
    await editor.save();
    expect(await readFile(join(root, "notes.md"), "utf-8")).toBe(">> ab\ncd");
  });
});

describe("languageForPath", () => {
  it.each([
    ["a.TS", "typescript"],
    ["README.md", "markdown"],
    ["Makefile", "plaintext"],
  ])("%s is %s", (path, language) => {
    expect(languageForPath(path)).toBe(language);
  });
});
