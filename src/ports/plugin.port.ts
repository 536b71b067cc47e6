// =============================================================================
// Plugin Port — Contract between the host and loaded plugin code
// =============================================================================

import type { JsonObject } from "../domain/host-command.schema.js";
import type { PluginManifest } from "../domain/manifest.schema.js";
import type { Logger } from "../logging.js";
import type { PluginHostApi } from "./host-api.port.js";

export type PluginEnvironment = "development" | "production";

/** Value passed once to a plugin's activate hook. Frozen. */
export interface PluginContext {
  readonly apiVersion: string;
  readonly appVersion: string;
  readonly environment: PluginEnvironment;
}

/** A manifest bound to its bundle on disk */
export interface Plugin {
  readonly manifest: PluginManifest;
  /** Absolute path of the `<id>.aicsplugin` directory */
  readonly bundlePath: string;
  /** Absolute path of the resolved entry file */
  readonly entryPath: string;
}

export interface PluginViewDescriptor {
  readonly title: string;
  readonly icon: string;
}

export interface PluginMenuItemDescriptor {
  readonly title: string;
  readonly icon: string;
  /** Plugin command run when the item is chosen */
  readonly command: string;
}

/** UI a plugin with the `ui` capability contributes to the shell */
export interface PluginUiContribution {
  readonly view?: PluginViewDescriptor;
  readonly menuItem?: PluginMenuItemDescriptor;
  readonly sidebarItem?: PluginViewDescriptor;
}

export type PluginCommandHandler = (args: JsonObject, host: PluginHostApi) => unknown;

/** Shape of a plugin entry point once validated by a loader */
export interface PluginModule {
  activate?(context: PluginContext, host: PluginHostApi): unknown;
  deactivate?(): unknown;
  readonly commands: ReadonlyMap<string, PluginCommandHandler>;
  readonly ui?: PluginUiContribution;
}

export type PluginState = "inactive" | "activating" | "active" | "deactivating";

export interface PluginInstance {
  readonly plugin: Plugin;
  readonly state: PluginState;
  readonly module: PluginModule;
  readonly uiProvider?: PluginUiContribution;
  readonly activatedAt: number;
}

export interface LoadOptions {
  /** Upper bound for synchronous evaluation of the entry file */
  timeoutMs: number;
  logger: Logger;
}

/** Loads a plugin's entry point into an isolated execution context */
export interface PluginLoaderPort {
  load(plugin: Plugin, options: LoadOptions): Promise<PluginModule>;
}
