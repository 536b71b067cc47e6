// =============================================================================
// VmPluginLoaderAdapter — Evaluates plugin entry points in a fresh vm context
// =============================================================================

import { readFile } from "node:fs/promises";
import { z } from "zod";

import { LoadError } from "../../errors.js";
import { log, type Logger } from "../../logging.js";
import type {
  LoadOptions,
  Plugin,
  PluginCommandHandler,
  PluginLoaderPort,
  PluginModule,
  PluginUiContribution,
} from "../../ports/plugin.port.js";
import type { ExportsDescriptor } from "./bridge-script.js";
import { PluginBridge } from "./plugin-bridge.js";

const ViewSchema = z.object({ title: z.string().min(1), icon: z.string() });

const UiContributionSchema = z.object({
  view: ViewSchema.optional(),
  menuItem: ViewSchema.extend({ command: z.string().min(1) }).optional(),
  sidebarItem: ViewSchema.optional(),
});

/**
 * Entry files are CommonJS-style scripts:
 *
 * ```js
 * module.exports = {
 *   activate(context, host) {},
 *   deactivate() {},
 *   commands: { format: async (args, host) => ... },
 *   ui: { view: { title: "Docker", icon: "shippingbox" } },
 * };
 * ```
 *
 * Each plugin gets its own vm context with no `require`, `process`,
 * `Buffer`, `URL` or `TextEncoder`, and string code generation (`eval`,
 * `new Function`) disabled. Console, timers and the host API are built inside
 * the context and talk to the host through a {@link PluginBridge}, so plugin
 * code holds no host-realm function. Arguments and results cross as JSON.
 *
 * Every turn of plugin code is bounded by `LoadOptions.timeoutMs`; a plugin
 * that overruns it is halted and every later call rejects. A vm context is
 * still one isolate shared with the host: memory and CPU between turns are
 * not limited.
 */
export class VmPluginLoaderAdapter implements PluginLoaderPort {
  async load(plugin: Plugin, options: LoadOptions): Promise<PluginModule> {
    const { id } = plugin.manifest;

    let code: string;
    try {
      code = await readFile(plugin.entryPath, "utf-8");
    } catch (err) {
      throw new LoadError(id, `cannot read entry point ${plugin.manifest.entryPoint}`, { cause: err });
    }

    const bridge = new PluginBridge({ pluginId: id, timeoutMs: options.timeoutMs, logger: options.logger });
    const exported = bridge.evaluate(code, plugin.entryPath);
    try {
      return toPluginModule(plugin, exported, bridge, options.logger);
    } catch (err) {
      bridge.dispose();
      throw err;
    }
  }
}

/**
 * Validates what the entry file exported and returns a module whose hooks
 * and commands call into the context. `deactivate` is always present so the
 * context's timers stop when the plugin does.
 */
export function toPluginModule(
  plugin: Plugin,
  exported: ExportsDescriptor,
  bridge: PluginBridge,
  logger: Logger,
): PluginModule {
  const { id } = plugin.manifest;

  if (exported.kind !== "object") {
    throw new LoadError(id, "entry point must assign an object to module.exports");
  }
  if (exported.activate !== "undefined" && exported.activate !== "function") {
    throw new LoadError(id, "exported activate must be a function");
  }
  if (exported.deactivate !== "undefined" && exported.deactivate !== "function") {
    throw new LoadError(id, "exported deactivate must be a function");
  }

  const commands = new Map<string, PluginCommandHandler>();
  if (exported.commands === null) {
    throw new LoadError(id, "exported commands must be an object of functions");
  }
  for (const [name, type] of exported.commands ?? []) {
    if (type !== "function") {
      throw new LoadError(id, `command "${name}" must be a function`);
    }
    commands.set(name, (args, host) => bridge.call(`command "${name}"`, { kind: "command", name }, [args], host));
  }

  let ui: PluginUiContribution | undefined;
  if (exported.ui) {
    if (!plugin.manifest.capabilities.includes("ui")) {
      log(logger, "warn", "load:ui-ignored", { reason: "manifest does not declare the ui capability" }, id);
    } else {
      ui = parseUi(id, exported.ui.json);
    }
  }

  const hasDeactivate = exported.deactivate === "function";
  return {
    activate:
      exported.activate === "function"
        ? (context, host) => bridge.call("activation", { kind: "activate" }, [context], host)
        : undefined,
    deactivate: async () => {
      try {
        if (hasDeactivate) await bridge.call("deactivation", { kind: "deactivate" }, []);
      } finally {
        bridge.dispose();
      }
    },
    commands,
    ui,
  };
}

function parseUi(pluginId: string, json: string | null): PluginUiContribution {
  if (json === null) throw new LoadError(pluginId, "invalid ui contribution: value is not JSON");
  const parsed = UiContributionSchema.safeParse(JSON.parse(json));
  if (!parsed.success) {
    throw new LoadError(pluginId, `invalid ui contribution: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
  }
  return parsed.data;
}
