#!/usr/bin/env node
// =============================================================================
// aics-plugins CLI — Main entry point
// =============================================================================

import { parseArgs } from "node:util";

import { AiSdkCompletionAdapter } from "../adapters/host-services/ai-sdk-completion.adapter.js";
import { loadConfig, type PluginHostConfig } from "../config.js";
import { describeError } from "../errors.js";
import { PluginHost } from "../plugins/plugin-host.js";
import type { AiCompletionPort } from "../ports/host-services.port.js";
import {
  isPluginCategory,
  pluginDiscover,
  pluginInstall,
  pluginList,
  pluginRun,
  pluginSearch,
  pluginSign,
  pluginUninstall,
} from "./commands/plugin.js";
import { bold, color } from "./format.js";
import { createModel, ENV_MAP, resolveApiKey } from "./providers.js";

const VERSION = "1.0.0";

const HELP = `
${bold("aics-plugins")} — Plugin host for the AI Coding Suite

${bold("Usage:")}
  aics-plugins list                              List installed plugins
  aics-plugins discover                          Rescan the plugins directory
  aics-plugins install <source> [--registry]     Install from a directory, archive or URL
  aics-plugins uninstall <id>                    Remove an installed plugin
  aics-plugins search <query> [--category <c>]   Search the plugin registry
  aics-plugins run <id> <command> [--args <json>] Activate a plugin and run a command
  aics-plugins sign <bundleDir> --key <pem-file> Write bundle.sig with an Ed25519 key

${bold("Options:")}
  --registry  Treat <source> as a plugin id in the configured registry
  --category  all, languages, themes, tools, ai, ui
  --args      JSON object passed to the plugin command
  --key       PKCS#8 PEM private key used by sign
  --help      Show this help
  --version   Show version

${bold("Configuration:")}
  ~/.aicsrc (JSON), overridden by AICS_PLUGINS_DIR, AICS_ENV,
  AICS_LOG_LEVEL and AICS_REGISTRY_URL.
  AI completions use ${Object.values(ENV_MAP).join(" or ")}.
`;

function usage(line: string): void {
  console.error(color("red", `Usage: aics-plugins ${line}`));
  process.exitCode = 1;
}

async function createHost(config: PluginHostConfig): Promise<PluginHost> {
  let ai: AiCompletionPort | undefined;
  if (config.ai) {
    const apiKey = resolveApiKey(config.ai.provider);
    if (apiKey) {
      ai = new AiSdkCompletionAdapter({ model: await createModel(config.ai.provider, apiKey, config.ai.model) });
    } else {
      console.error(color("yellow", `${ENV_MAP[config.ai.provider]} is not set; ai.complete will fail`));
    }
  }
  return PluginHost.create(config, { services: { ai } });
}

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      category: { type: "string", short: "c" },
      args: { type: "string", short: "a" },
      key: { type: "string", short: "k" },
      registry: { type: "boolean" },
      help: { type: "boolean", short: "h" },
      version: { type: "boolean", short: "v" },
    },
  });

  if (values.help) {
    console.log(HELP);
    return;
  }

  if (values.version) {
    console.log(`aics-plugins v${VERSION}`);
    return;
  }

  const [command, first, second] = positionals;

  if (!command) {
    console.log(HELP);
    return;
  }

  if (command === "sign") {
    if (!first || !values.key) return usage("sign <bundleDir> --key <pem-file>");
    return pluginSign(first, values.key);
  }

  const host = await createHost(loadConfig());

  switch (command) {
    case "list":
      return pluginList(host);

    case "discover":
      return pluginDiscover(host);

    case "install":
      if (!first) return usage("install <source> [--registry]");
      return pluginInstall(host, first, { fromRegistry: values.registry });

    case "uninstall":
      if (!first) return usage("uninstall <id>");
      return pluginUninstall(host, first);

    case "search": {
      const category = values.category ?? "all";
      if (!isPluginCategory(category)) return usage("search <query> [--category all|languages|themes|tools|ai|ui]");
      return pluginSearch(host, positionals.slice(1).join(" "), category);
    }

    case "run":
      if (!first || !second) return usage("run <id> <command> [--args <json>]");
      return pluginRun(host, first, second, values.args);

    default:
      console.error(color("red", `Unknown command: ${command}`));
      console.log(HELP);
      process.exitCode = 1;
  }
}

main().catch((err) => {
  console.error(color("red", `\n✗ ${describeError(err)}\n`));
  process.exitCode = 1;
});
