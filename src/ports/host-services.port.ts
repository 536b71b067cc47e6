// =============================================================================
// Host Services Port — Editor subsystems the Host API delegates to
// =============================================================================

import type { NotificationLevel } from "../domain/host-command.schema.js";

export interface WorkspacePort {
  /** Absolute path of the workspace root */
  readonly rootPath: string;
  readFile(path: string): Promise<string>;
  writeFile(path: string, content: string): Promise<void>;
}

export interface TerminalExecuteOptions {
  cwd?: string;
  timeoutMs?: number;
}

export interface TerminalResult {
  /** stdout + stderr combined */
  output: string;
  exitCode: number;
  truncated: boolean;
  durationMs: number;
}

export interface TerminalPort {
  execute(command: string, options?: TerminalExecuteOptions): Promise<TerminalResult>;
}

export interface NetworkRequest {
  url: string;
  method: string;
  headers?: Record<string, string>;
  body?: string;
}

export interface NetworkResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

export interface NetworkPort {
  request(request: NetworkRequest): Promise<NetworkResponse>;
}

export interface ClipboardPort {
  read(): Promise<string>;
  write(text: string): Promise<void>;
}

export interface NotificationRequest {
  pluginId: string;
  message: string;
  level: NotificationLevel;
}

export interface UiPort {
  showNotification(notification: NotificationRequest): Promise<void>;
  /** Resolves to `undefined` when the user dismisses the dialog */
  showInputDialog(pluginId: string, prompt: string): Promise<string | undefined>;
}

export interface AiCompletionRequest {
  prompt: string;
  system?: string;
}

export interface AiCompletionPort {
  complete(request: AiCompletionRequest): Promise<string>;
}

export interface CursorPosition {
  line: number;
  character: number;
}

export interface EditorSnapshot {
  filePath: string;
  language: string;
  text: string;
  selection?: string;
  cursor: CursorPosition;
}

export interface EditorPort {
  getActiveEditor(): Promise<EditorSnapshot | undefined>;
  openFile(path: string): Promise<void>;
  insertText(text: string): Promise<void>;
}

export interface HostServices {
  workspace: WorkspacePort;
  terminal: TerminalPort;
  network: NetworkPort;
  clipboard: ClipboardPort;
  ui: UiPort;
  ai: AiCompletionPort;
  editor: EditorPort;
}
