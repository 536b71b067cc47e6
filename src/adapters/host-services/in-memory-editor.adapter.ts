// =============================================================================
// InMemoryEditorAdapter — Open document buffers with a cursor and selection
// =============================================================================

import { extname } from "node:path";

import type { CursorPosition, EditorPort, EditorSnapshot, WorkspacePort } from "../../ports/host-services.port.js";

const LANGUAGES: Record<string, string> = {
  ".ts": "typescript",
  ".tsx": "typescriptreact",
  ".js": "javascript",
  ".jsx": "javascriptreact",
  ".json": "json",
  ".md": "markdown",
  ".py": "python",
  ".rs": "rust",
  ".go": "go",
  ".sql": "sql",
  ".sh": "shellscript",
  ".css": "css",
  ".html": "html",
};

interface Document {
  filePath: string;
  text: string;
  cursor: CursorPosition;
  selection?: { start: CursorPosition; end: CursorPosition };
}

export function languageForPath(path: string): string {
  return LANGUAGES[extname(path).toLowerCase()] ?? "plaintext";
}

export class InMemoryEditorAdapter implements EditorPort {
  private readonly workspace: WorkspacePort;
  private readonly documents = new Map<string, Document>();
  private activePath: string | undefined;

  constructor(workspace: WorkspacePort) {
    this.workspace = workspace;
  }

  async getActiveEditor(): Promise<EditorSnapshot | undefined> {
    const doc = this.activeDocument();
    if (!doc) return undefined;
    return {
      filePath: doc.filePath,
      language: languageForPath(doc.filePath),
      text: doc.text,
      selection: doc.selection ? sliceRange(doc.text, doc.selection.start, doc.selection.end) : undefined,
      cursor: { ...doc.cursor },
    };
  }

  async openFile(path: string): Promise<void> {
    if (!this.documents.has(path)) {
      const text = await this.workspace.readFile(path);
      this.documents.set(path, { filePath: path, text, cursor: { line: 0, character: 0 } });
    }
    this.activePath = path;
  }

  /** Inserts at the cursor, replacing the selection if there is one. */
  async insertText(text: string): Promise<void> {
    const doc = this.activeDocument();
    if (!doc) throw new Error("No active editor");

    const start = doc.selection ? toOffset(doc.text, doc.selection.start) : toOffset(doc.text, doc.cursor);
    const end = doc.selection ? toOffset(doc.text, doc.selection.end) : start;
    doc.text = doc.text.slice(0, start) + text + doc.text.slice(end);
    doc.cursor = toPosition(doc.text, start + text.length);
    doc.selection = undefined;
  }

  setCursor(position: CursorPosition): void {
    const doc = this.activeDocument();
    if (!doc) return;
    doc.cursor = toPosition(doc.text, toOffset(doc.text, position));
    doc.selection = undefined;
  }

  setSelection(start: CursorPosition, end: CursorPosition): void {
    const doc = this.activeDocument();
    if (!doc) return;
    const [from, to] = [toOffset(doc.text, start), toOffset(doc.text, end)].sort((a, b) => a - b);
    doc.selection = { start: toPosition(doc.text, from ?? 0), end: toPosition(doc.text, to ?? 0) };
    doc.cursor = toPosition(doc.text, to ?? 0);
  }

  /** Writes the active buffer back to the workspace */
  async save(): Promise<void> {
    const doc = this.activeDocument();
    if (!doc) return;
    await this.workspace.writeFile(doc.filePath, doc.text);
  }

  private activeDocument(): Document | undefined {
    return this.activePath === undefined ? undefined : this.documents.get(this.activePath);
  }
}

function toOffset(text: string, position: CursorPosition): number {
  const lines = text.split("\n");
  const line = Math.min(Math.max(position.line, 0), lines.length - 1);
  let offset = 0;
  for (let i = 0; i < line; i++) offset += (lines[i] ?? "").length + 1;
  const lineLength = (lines[line] ?? "").length;
  return offset + Math.min(Math.max(position.character, 0), lineLength);
}

function toPosition(text: string, offset: number): CursorPosition {
  const before = text.slice(0, offset).split("\n");
  return { line: before.length - 1, character: (before[before.length - 1] ?? "").length };
}

function sliceRange(text: string, start: CursorPosition, end: CursorPosition): string {
  return text.slice(toOffset(text, start), toOffset(text, end));
}
