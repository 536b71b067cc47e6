// =============================================================================
// Host API Port — Surface handed to activated plugin code
// =============================================================================

import type { NotificationLevel } from "../domain/host-command.schema.js";
import type { EditorSnapshot, NetworkResponse, TerminalResult } from "./host-services.port.js";

export type HostCommandResult = string | void | undefined | TerminalResult | NetworkResponse | EditorSnapshot;

/**
 * Every method checks the calling plugin's declared permissions before it
 * reaches the underlying subsystem. `invoke` takes the raw tagged command
 * (a `HostCommandInput`, checked at run time since plugin code is untyped);
 * the grouped helpers build the same commands. A handle stops working once
 * the activation it was issued for has ended.
 */
export interface PluginHostApi {
  readonly apiVersion: string;
  invoke(command: unknown): Promise<HostCommandResult>;
  readonly workspace: {
    readFile(path: string): Promise<string>;
    writeFile(path: string, content: string): Promise<void>;
    /** Absolute path of the workspace root */
    getPath(): Promise<string>;
  };
  readonly terminal: {
    execute(command: string, options?: { cwd?: string; timeoutMs?: number }): Promise<TerminalResult>;
  };
  readonly network: {
    request(
      url: string,
      init?: { method?: "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "HEAD"; headers?: Record<string, string>; body?: string },
    ): Promise<NetworkResponse>;
  };
  readonly clipboard: {
    read(): Promise<string>;
    write(text: string): Promise<void>;
  };
  readonly ui: {
    showNotification(message: string, level?: NotificationLevel): Promise<void>;
    showInputDialog(prompt: string): Promise<string | undefined>;
  };
  readonly ai: {
    complete(prompt: string, options?: { system?: string }): Promise<string>;
  };
  readonly editor: {
    getActiveEditor(): Promise<EditorSnapshot | undefined>;
    openFile(path: string): Promise<void>;
    insertText(text: string): Promise<void>;
  };
}
