// =============================================================================
// HostApi — Permission-gated host commands for plugin code
// =============================================================================

import {
  COMMAND_PERMISSIONS,
  HOST_API_VERSION,
  HostCommandSchema,
  hostCommandType,
  parseHostCommand,
  type HostCommand,
  type HostCommandType,
  type NotificationLevel,
} from "../domain/host-command.schema.js";
import type { PluginPermission } from "../domain/manifest.schema.js";
import { InvalidCommandError, MissingPermissionError, PluginInactiveError } from "../errors.js";
import { log, silentLogger, type Logger } from "../logging.js";
import type { HostCommandResult, PluginHostApi } from "../ports/host-api.port.js";
import type { HostServices } from "../ports/host-services.port.js";
import type { Plugin } from "../ports/plugin.port.js";

/** Human-readable operation names used in permission errors */
export const OPERATION_LABELS: Record<HostCommandType, string> = {
  "workspace.readFile": "read workspace file",
  "workspace.writeFile": "write workspace file",
  "workspace.getPath": "read workspace path",
  "terminal.execute": "execute terminal command",
  "network.request": "make network request",
  "clipboard.read": "read clipboard",
  "clipboard.write": "write clipboard",
  "ui.showNotification": "show user notification",
  "ui.showInputDialog": "ask the user for input",
  "ai.complete": "request AI completion",
  "editor.getActiveEditor": "read active editor state",
  "editor.openFile": "open a file in the editor",
  "editor.insertText": "insert text at the cursor",
};

/** Reports whether the activation a handle was issued for is still running. */
export type LivenessCheck = () => boolean;

const ALWAYS_LIVE: LivenessCheck = () => true;

export interface HostApiOptions {
  apiVersion?: string;
  logger?: Logger;
}

export class HostApi {
  readonly apiVersion: string;
  private readonly services: HostServices;
  private readonly logger: Logger;

  constructor(services: HostServices, options: HostApiOptions = {}) {
    this.services = services;
    this.apiVersion = options.apiVersion ?? HOST_API_VERSION;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Checks that `plugin` declared every permission the command type needs,
   * then validates the payload and runs it. A plugin lacking the permission
   * gets `MissingPermissionError` whatever the rest of the payload holds.
   */
  async invoke(plugin: Plugin, input: unknown, isLive: LivenessCheck = ALWAYS_LIVE): Promise<HostCommandResult> {
    this.assertLive(plugin, isLive);
    const type = hostCommandType(input);
    if (type === undefined) {
      throw new InvalidCommandError("Invalid host command", ["type: not a known host command"]);
    }
    this.authorize(plugin, type);
    return this.dispatch(plugin, parseHostCommand(input));
  }

  /** Throws `MissingPermissionError` naming every permission `plugin` lacks for `type`. */
  authorize(plugin: Plugin, type: HostCommandType): void {
    const { id, permissions } = plugin.manifest;
    const required: readonly PluginPermission[] = COMMAND_PERMISSIONS[type];
    const missing = required.filter((permission) => !permissions.includes(permission));
    if (missing.length > 0) {
      log(this.logger, "warn", "host:permission-denied", { command: type, missing }, id);
      throw new MissingPermissionError(id, OPERATION_LABELS[type], missing);
    }
    log(this.logger, "debug", "host:invoke", { command: type }, id);
  }

  /**
   * The frozen API object handed to one plugin's code. Once `isLive` returns
   * false every call on it rejects with `PluginInactiveError`.
   */
  forPlugin(plugin: Plugin, isLive: LivenessCheck = ALWAYS_LIVE): PluginHostApi {
    const { workspace, terminal, network, clipboard, ui, ai, editor } = this.services;
    const pluginId = plugin.manifest.id;

    return Object.freeze({
      apiVersion: this.apiVersion,
      invoke: (command: unknown) => this.invoke(plugin, command, isLive),
      workspace: Object.freeze({
        readFile: (path: string) =>
          this.call(plugin, isLive, { type: "workspace.readFile", path }, (c) => workspace.readFile(c.path)),
        writeFile: (path: string, content: string) =>
          this.call(plugin, isLive, { type: "workspace.writeFile", path, content }, (c) =>
            workspace.writeFile(c.path, c.content),
          ),
        getPath: () => this.call(plugin, isLive, { type: "workspace.getPath" }, async () => workspace.rootPath),
      }),
      terminal: Object.freeze({
        execute: (command: string, options?: { cwd?: string; timeoutMs?: number }) =>
          this.call(
            plugin,
            isLive,
            { type: "terminal.execute", command, cwd: options?.cwd, timeoutMs: options?.timeoutMs },
            (c) => terminal.execute(c.command, { cwd: c.cwd, timeoutMs: c.timeoutMs }),
          ),
      }),
      network: Object.freeze({
        request: (
          url: string,
          init?: { method?: "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "HEAD"; headers?: Record<string, string>; body?: string },
        ) =>
          this.call(
            plugin,
            isLive,
            { type: "network.request", url, method: init?.method ?? "GET", headers: init?.headers, body: init?.body },
            (c) => network.request({ url: c.url, method: c.method, headers: c.headers, body: c.body }),
          ),
      }),
      clipboard: Object.freeze({
        read: () => this.call(plugin, isLive, { type: "clipboard.read" }, () => clipboard.read()),
        write: (text: string) => this.call(plugin, isLive, { type: "clipboard.write", text }, (c) => clipboard.write(c.text)),
      }),
      ui: Object.freeze({
        showNotification: (message: string, level: NotificationLevel = "info") =>
          this.call(plugin, isLive, { type: "ui.showNotification", message, level }, (c) =>
            ui.showNotification({ pluginId, message: c.message, level: c.level }),
          ),
        showInputDialog: (prompt: string) =>
          this.call(plugin, isLive, { type: "ui.showInputDialog", prompt }, (c) => ui.showInputDialog(pluginId, c.prompt)),
      }),
      ai: Object.freeze({
        complete: (prompt: string, options?: { system?: string }) =>
          this.call(plugin, isLive, { type: "ai.complete", prompt, system: options?.system }, (c) =>
            ai.complete({ prompt: c.prompt, system: c.system }),
          ),
      }),
      editor: Object.freeze({
        getActiveEditor: () => this.call(plugin, isLive, { type: "editor.getActiveEditor" }, () => editor.getActiveEditor()),
        openFile: (path: string) => this.call(plugin, isLive, { type: "editor.openFile", path }, (c) => editor.openFile(c.path)),
        insertText: (text: string) =>
          this.call(plugin, isLive, { type: "editor.insertText", text }, (c) => editor.insertText(c.text)),
      }),
    });
  }

  // ─── Private ────────────────────────────────────────────────────────────

  private assertLive(plugin: Plugin, isLive: LivenessCheck): void {
    if (!isLive()) {
      log(this.logger, "warn", "host:inactive-call", {}, plugin.manifest.id);
      throw new PluginInactiveError(plugin.manifest.id);
    }
  }

  /**
   * Helpers build fully-defaulted commands themselves, so validation only has
   * to reject bad payloads coming from plugin code.
   */
  private async call<C extends HostCommand, R>(
    plugin: Plugin,
    isLive: LivenessCheck,
    command: C,
    run: (command: C) => Promise<R>,
  ): Promise<R> {
    this.assertLive(plugin, isLive);
    this.authorize(plugin, command.type);
    const result = HostCommandSchema.safeParse(command);
    if (!result.success) {
      throw new InvalidCommandError(
        `Invalid arguments for ${command.type}`,
        result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
      );
    }
    return run(command);
  }

  private async dispatch(plugin: Plugin, command: HostCommand): Promise<HostCommandResult> {
    const { workspace, terminal, network, clipboard, ui, ai, editor } = this.services;
    const pluginId = plugin.manifest.id;

    switch (command.type) {
      case "workspace.readFile":
        return workspace.readFile(command.path);
      case "workspace.writeFile":
        return workspace.writeFile(command.path, command.content);
      case "workspace.getPath":
        return workspace.rootPath;
      case "terminal.execute":
        return terminal.execute(command.command, { cwd: command.cwd, timeoutMs: command.timeoutMs });
      case "network.request":
        return network.request({ url: command.url, method: command.method, headers: command.headers, body: command.body });
      case "clipboard.read":
        return clipboard.read();
      case "clipboard.write":
        return clipboard.write(command.text);
      case "ui.showNotification":
        return ui.showNotification({ pluginId, message: command.message, level: command.level });
      case "ui.showInputDialog":
        return ui.showInputDialog(pluginId, command.prompt);
      case "ai.complete":
        return ai.complete({ prompt: command.prompt, system: command.system });
      case "editor.getActiveEditor":
        return editor.getActiveEditor();
      case "editor.openFile":
        return editor.openFile(command.path);
      case "editor.insertText":
        return editor.insertText(command.text);
      default: {
        const unhandled: never = command;
        throw new InvalidCommandError(`Unhandled host command: ${JSON.stringify(unhandled)}`);
      }
    }
  }
}
