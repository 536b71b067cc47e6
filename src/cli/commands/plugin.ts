// =============================================================================
// CLI Plugin Commands — list, discover, install, uninstall, search, run, sign
// =============================================================================

import { readFile } from "node:fs/promises";

import { signBundle } from "../../adapters/signature/ed25519-verifier.adapter.js";
import { InvalidCommandError } from "../../errors.js";
import type { PluginHost } from "../../plugins/plugin-host.js";
import type { PluginCategory } from "../../ports/marketplace.port.js";
import { bold, color, formatPlugin, formatResult } from "../format.js";

export interface CliOutput {
  out(line: string): void;
  err(line: string): void;
}

export const consoleOutput: CliOutput = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

const CATEGORIES: readonly PluginCategory[] = ["all", "languages", "themes", "tools", "ai", "ui"];

export function isPluginCategory(value: string): value is PluginCategory {
  return CATEGORIES.some((category) => category === value);
}

export async function pluginList(host: PluginHost, io: CliOutput = consoleOutput): Promise<void> {
  const plugins = await host.start();
  if (plugins.length === 0) {
    io.out(color("dim", `No plugins installed in ${host.config.pluginsDir}`));
    return;
  }
  io.out(bold(`Installed plugins (${plugins.length}):`));
  for (const plugin of plugins) io.out(formatPlugin(plugin));
}

/** Rescans the plugins directory and reports skipped bundles. */
export async function pluginDiscover(host: PluginHost, io: CliOutput = consoleOutput): Promise<void> {
  const skipped: string[] = [];
  const unsubscribe = host.events.on("plugin:skipped", (event) => {
    skipped.push(`${event.data.bundlePath}: ${event.data.reason}`);
  });
  try {
    const plugins = await host.start();
    io.out(color("green", `✓ Found ${plugins.length} plugin(s) in ${host.config.pluginsDir}`));
    for (const line of skipped) io.err(color("yellow", `  skipped ${line}`));
  } finally {
    unsubscribe();
  }
}

export async function pluginInstall(
  host: PluginHost,
  source: string,
  options: { fromRegistry?: boolean } = {},
  io: CliOutput = consoleOutput,
): Promise<void> {
  await host.start();
  const plugin = options.fromRegistry ? await host.installFromMarketplace(source) : await host.install(source);
  io.out(color("green", `✓ Installed ${plugin.manifest.name} v${plugin.manifest.version} (${plugin.manifest.id})`));
}

export async function pluginUninstall(host: PluginHost, pluginId: string, io: CliOutput = consoleOutput): Promise<void> {
  await host.start();
  await host.uninstall(pluginId);
  io.out(color("green", `✓ Uninstalled ${pluginId}`));
}

export async function pluginSearch(
  host: PluginHost,
  query: string,
  category: PluginCategory = "all",
  io: CliOutput = consoleOutput,
): Promise<void> {
  await host.start();
  const results = await host.search(query, category);
  if (results.length === 0) {
    io.out(color("dim", `No plugins match "${query}"`));
    return;
  }
  for (const result of results) {
    io.out(formatPlugin(result, result.installed ? ` ${color("green", "[installed]")}` : ""));
  }
}

/** Activates a plugin, runs one of its commands and prints the result. */
export async function pluginRun(
  host: PluginHost,
  pluginId: string,
  command: string,
  argsJson: string | undefined,
  io: CliOutput = consoleOutput,
): Promise<void> {
  let args: unknown;
  if (argsJson !== undefined) {
    try {
      args = JSON.parse(argsJson);
    } catch {
      throw new InvalidCommandError("--args must be valid JSON");
    }
  }

  await host.start();
  await host.activate(pluginId);
  try {
    const result = await host.executeCommand(pluginId, command, args);
    io.out(formatResult(result));
  } finally {
    await host.shutdown();
  }
}

export async function pluginSign(bundleDir: string, keyPath: string, io: CliOutput = consoleOutput): Promise<void> {
  const privateKeyPem = await readFile(keyPath, "utf-8");
  const signature = await signBundle(bundleDir, privateKeyPem);
  io.out(color("green", `✓ Signed ${bundleDir}`));
  io.out(color("dim", signature));
}
