// =============================================================================
// Host Command Schema — Closed, versioned command set exposed to plugin code
// =============================================================================

import { z } from "zod";

import { InvalidCommandError } from "../errors.js";
import type { PluginPermission } from "./manifest.schema.js";

/** Bumped whenever a command is added or a payload changes shape */
export const HOST_API_VERSION = "1.0.0";

export const NotificationLevelSchema = z.enum(["info", "warning", "error", "success"]);
export type NotificationLevel = z.infer<typeof NotificationLevelSchema>;

const WorkspacePathSchema = z.string().min(1);

export const ReadFileCommandSchema = z.object({
  type: z.literal("workspace.readFile"),
  path: WorkspacePathSchema,
});

export const GetWorkspacePathCommandSchema = z.object({
  type: z.literal("workspace.getPath"),
});

export const WriteFileCommandSchema = z.object({
  type: z.literal("workspace.writeFile"),
  path: WorkspacePathSchema,
  content: z.string(),
});

export const TerminalExecuteCommandSchema = z.object({
  type: z.literal("terminal.execute"),
  command: z.string().min(1),
  cwd: z.string().optional(),
  timeoutMs: z.number().int().positive().optional(),
});

export const NetworkRequestCommandSchema = z.object({
  type: z.literal("network.request"),
  url: z.string().url(),
  method: z.enum(["GET", "POST", "PUT", "PATCH", "DELETE", "HEAD"]).default("GET"),
  headers: z.record(z.string()).optional(),
  body: z.string().optional(),
});

export const ClipboardReadCommandSchema = z.object({
  type: z.literal("clipboard.read"),
});

export const ClipboardWriteCommandSchema = z.object({
  type: z.literal("clipboard.write"),
  text: z.string(),
});

export const ShowNotificationCommandSchema = z.object({
  type: z.literal("ui.showNotification"),
  message: z.string().min(1),
  level: NotificationLevelSchema.default("info"),
});

export const ShowInputDialogCommandSchema = z.object({
  type: z.literal("ui.showInputDialog"),
  prompt: z.string().min(1),
});

export const AiCompleteCommandSchema = z.object({
  type: z.literal("ai.complete"),
  prompt: z.string().min(1),
  system: z.string().optional(),
});

export const GetActiveEditorCommandSchema = z.object({
  type: z.literal("editor.getActiveEditor"),
});

export const OpenFileCommandSchema = z.object({
  type: z.literal("editor.openFile"),
  path: WorkspacePathSchema,
});

export const InsertTextCommandSchema = z.object({
  type: z.literal("editor.insertText"),
  text: z.string(),
});

export const HostCommandSchema = z.discriminatedUnion("type", [
  ReadFileCommandSchema,
  WriteFileCommandSchema,
  GetWorkspacePathCommandSchema,
  TerminalExecuteCommandSchema,
  NetworkRequestCommandSchema,
  ClipboardReadCommandSchema,
  ClipboardWriteCommandSchema,
  ShowNotificationCommandSchema,
  ShowInputDialogCommandSchema,
  AiCompleteCommandSchema,
  GetActiveEditorCommandSchema,
  OpenFileCommandSchema,
  InsertTextCommandSchema,
]);

export type HostCommand = z.infer<typeof HostCommandSchema>;
export type HostCommandInput = z.input<typeof HostCommandSchema>;
export type HostCommandType = HostCommand["type"];
export type HostCommandOf<T extends HostCommandType> = Extract<HostCommand, { type: T }>;

/** Permissions a plugin must declare before the host runs each command. */
export const COMMAND_PERMISSIONS = {
  "workspace.readFile": ["fileRead"],
  "workspace.writeFile": ["fileWrite"],
  "workspace.getPath": ["fileRead"],
  "terminal.execute": ["terminal", "process"],
  "network.request": ["network"],
  "clipboard.read": ["clipboard"],
  "clipboard.write": ["clipboard"],
  "ui.showNotification": ["notifications"],
  "ui.showInputDialog": ["notifications"],
  "ai.complete": ["network"],
  "editor.getActiveEditor": ["fileRead"],
  "editor.openFile": ["fileRead"],
  "editor.insertText": ["fileWrite"],
} as const satisfies Record<HostCommandType, readonly PluginPermission[]>;

export const HOST_COMMAND_TYPES = Object.keys(COMMAND_PERMISSIONS).filter(
  (type): type is HostCommandType => HostCommandSchema.optionsMap.has(type),
);

/** Reads the `type` of a host command payload without validating the rest of it. */
export function hostCommandType(input: unknown): HostCommandType | undefined {
  if (typeof input !== "object" || input === null || !("type" in input)) return undefined;
  const { type } = input;
  return HOST_COMMAND_TYPES.find((known) => known === type);
}

export function parseHostCommand(input: unknown): HostCommand {
  const result = HostCommandSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidCommandError(
      "Invalid host command",
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    );
  }
  return result.data;
}

// ─── Plugin command arguments ───────────────────────────────────────────────

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)]),
);

export const JsonObjectSchema: z.ZodType<JsonObject> = z.record(JsonValueSchema);

/** Validates the argument map passed to a plugin command. */
export function parseCommandArgs(input: unknown): JsonObject {
  if (input === undefined) return {};
  const result = JsonObjectSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidCommandError(
      "Command arguments must be a JSON object",
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    );
  }
  return result.data;
}
