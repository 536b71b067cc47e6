/**
 * Structured error hierarchy for the plugin host.
 *
 * Every error raised by the host extends {@link PluginHostError}, so callers
 * can branch on the class or on the `code` string:
 *
 * ```ts
 * try {
 *   await host.activate("com.example.fmt");
 * } catch (e) {
 *   if (e instanceof IncompatibleVersionError) { ... }
 *   if (e instanceof LoadError) { ... }
 * }
 * ```
 *
 * @module errors
 */

import type { PluginPermission } from "./domain/manifest.schema.js";

/** Base error for all plugin host errors. Includes an error code for programmatic matching. */
export class PluginHostError extends Error {
  readonly code: string;
  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PluginHostError";
    this.code = code;
  }
}

/** Thrown when a manifest is malformed, incomplete, or uses unknown enumeration values. */
export class ParseError extends PluginHostError {
  readonly issues: readonly string[];
  constructor(message: string, issues: readonly string[] = [], options?: { cause?: unknown }) {
    super("PARSE_ERROR", issues.length > 0 ? `${message}: ${issues.join("; ")}` : message, options);
    this.name = "ParseError";
    this.issues = issues;
  }
}

/** Thrown when fetching, extracting, verifying or registering a bundle fails. */
export class InstallError extends PluginHostError {
  readonly source: string;
  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super("INSTALL_ERROR", `Cannot install "${source}": ${message}`, options);
    this.name = "InstallError";
    this.source = source;
  }
}

/** Thrown when an operation names a plugin that is not installed. */
export class NotFoundError extends PluginHostError {
  readonly pluginId: string;
  constructor(pluginId: string) {
    super("NOT_FOUND", `Plugin "${pluginId}" is not installed`);
    this.name = "NotFoundError";
    this.pluginId = pluginId;
  }
}

/** Thrown when a plugin's entry point cannot be loaded or its activate hook fails. */
export class LoadError extends PluginHostError {
  readonly pluginId: string;
  constructor(pluginId: string, message: string, options?: { cause?: unknown; code?: string }) {
    super(options?.code ?? "LOAD_ERROR", `Plugin "${pluginId}" failed to load: ${message}`, options);
    this.name = "LoadError";
    this.pluginId = pluginId;
  }
}

/** Thrown when plugin code does not settle within its time budget. */
export class PluginTimeoutError extends LoadError {
  readonly phase: string;
  readonly timeoutMs: number;
  constructor(pluginId: string, phase: string, timeoutMs: number) {
    super(pluginId, `${phase} timed out after ${timeoutMs}ms`, { code: "PLUGIN_TIMEOUT" });
    this.message = `Plugin "${pluginId}" ${phase} timed out after ${timeoutMs}ms`;
    this.name = "PluginTimeoutError";
    this.phase = phase;
    this.timeoutMs = timeoutMs;
  }
}

/** Thrown when a manifest's minimum host version exceeds the running host version. */
export class IncompatibleVersionError extends PluginHostError {
  readonly pluginId: string;
  readonly requiredVersion: string;
  readonly hostVersion: string;
  constructor(pluginId: string, requiredVersion: string, hostVersion: string) {
    super(
      "INCOMPATIBLE_VERSION",
      `Plugin "${pluginId}" requires host version ${requiredVersion} or later (running ${hostVersion})`,
    );
    this.name = "IncompatibleVersionError";
    this.pluginId = pluginId;
    this.requiredVersion = requiredVersion;
    this.hostVersion = hostVersion;
  }
}

/** Thrown when a plugin calls a host operation without declaring the permissions it needs. */
export class MissingPermissionError extends PluginHostError {
  readonly pluginId: string;
  readonly operation: string;
  readonly missing: readonly PluginPermission[];
  constructor(pluginId: string, operation: string, missing: readonly PluginPermission[]) {
    super(
      "MISSING_PERMISSION",
      `Plugin "${pluginId}" needs permission ${missing.join(" + ")} for ${operation}`,
    );
    this.name = "MissingPermissionError";
    this.pluginId = pluginId;
    this.operation = operation;
    this.missing = missing;
  }
}

/** Thrown when a host command or command argument map does not match its schema. */
export class InvalidCommandError extends PluginHostError {
  readonly issues: readonly string[];
  constructor(message: string, issues: readonly string[] = []) {
    super("INVALID_COMMAND", issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "InvalidCommandError";
    this.issues = issues;
  }
}

/** Thrown when a plugin command handler raises an error of its own. */
export class PluginCommandError extends PluginHostError {
  readonly pluginId: string;
  readonly command: string;
  constructor(pluginId: string, command: string, message: string, options?: { cause?: unknown }) {
    super("COMMAND_FAILED", `Command "${command}" of plugin "${pluginId}" failed: ${message}`, options);
    this.name = "PluginCommandError";
    this.pluginId = pluginId;
    this.command = command;
  }
}

/** Thrown when a host API handle is used after its plugin has been deactivated. */
export class PluginInactiveError extends PluginHostError {
  readonly pluginId: string;
  constructor(pluginId: string) {
    super("PLUGIN_INACTIVE", `Plugin "${pluginId}" is not active`);
    this.name = "PluginInactiveError";
    this.pluginId = pluginId;
  }
}

/** Thrown when a plugin network request is refused or its response cannot be read. */
export class NetworkError extends PluginHostError {
  readonly url: string;
  constructor(url: string, message: string, options?: { cause?: unknown }) {
    super("NETWORK_ERROR", message, options);
    this.name = "NetworkError";
    this.url = url;
  }
}

/** Thrown when the marketplace catalog cannot be fetched or parsed. */
export class MarketplaceError extends PluginHostError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("MARKETPLACE_ERROR", message, options);
    this.name = "MarketplaceError";
  }
}

/** Thrown when a workspace path resolves outside the workspace root. */
export class WorkspaceAccessError extends PluginHostError {
  readonly path: string;
  constructor(path: string, message: string) {
    super("WORKSPACE_ACCESS", `Workspace access denied for "${path}": ${message}`);
    this.name = "WorkspaceAccessError";
    this.path = path;
  }
}

/** Thrown when the host configuration fails validation. */
export class ConfigError extends PluginHostError {
  readonly field?: string;
  constructor(message: string, field?: string) {
    super("CONFIG_ERROR", field ? `Invalid "${field}": ${message}` : message);
    this.name = "ConfigError";
    this.field = field;
  }
}

/**
 * Extracts a readable message from anything thrown.
 * Errors raised inside a plugin's vm context are not `instanceof Error` here.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
    return error.message;
  }
  return String(error);
}
