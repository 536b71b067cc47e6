// =============================================================================
// PluginHost — Wires the store, installer, activation engine and host API
// =============================================================================

import { ArchiveBundleSourceAdapter } from "../adapters/bundle/archive-bundle-source.adapter.js";
import { UnconfiguredAiCompletionAdapter } from "../adapters/host-services/ai-sdk-completion.adapter.js";
import { FetchNetworkAdapter } from "../adapters/host-services/fetch-network.adapter.js";
import { InMemoryClipboardAdapter } from "../adapters/host-services/in-memory-clipboard.adapter.js";
import { InMemoryEditorAdapter } from "../adapters/host-services/in-memory-editor.adapter.js";
import { LocalShellTerminalAdapter } from "../adapters/host-services/local-shell-terminal.adapter.js";
import { LoggerUiAdapter } from "../adapters/host-services/logger-ui.adapter.js";
import { NodeWorkspaceAdapter } from "../adapters/host-services/node-workspace.adapter.js";
import { RegistryCatalogAdapter } from "../adapters/plugin-marketplace/registry-catalog.adapter.js";
import { VmPluginLoaderAdapter } from "../adapters/sandbox/vm-plugin-loader.adapter.js";
import { Ed25519SignatureVerifier } from "../adapters/signature/ed25519-verifier.adapter.js";
import type { PluginHostConfig } from "../config.js";
import { ConfigError, describeError, InstallError } from "../errors.js";
import { createConsoleLogger, log, type Logger } from "../logging.js";
import type { BundleSourcePort, SignatureVerifierPort } from "../ports/bundle.port.js";
import type { HostServices } from "../ports/host-services.port.js";
import type { MarketplaceListing, MarketplacePort, PluginCategory } from "../ports/marketplace.port.js";
import type { Plugin, PluginInstance, PluginLoaderPort, PluginUiContribution } from "../ports/plugin.port.js";
import { ActivationEngine } from "./activation-engine.js";
import { HostApi } from "./host-api.js";
import { InstallationManager, type InstallOptions } from "./installation-manager.js";
import { ManifestStore } from "./manifest-store.js";
import { PluginEventBus } from "./plugin-events.js";

export interface PluginHostOverrides {
  logger?: Logger;
  events?: PluginEventBus;
  loader?: PluginLoaderPort;
  source?: BundleSourcePort;
  verifier?: SignatureVerifierPort;
  marketplace?: MarketplacePort;
  /** Replaces individual host services; the rest use the default adapters */
  services?: Partial<HostServices>;
}

export interface AvailablePlugin extends MarketplaceListing {
  installed: boolean;
}

/**
 * One explicitly constructed host per editor window. Nothing here is global:
 * tests and embedders create as many hosts as they need.
 *
 * ```ts
 * const host = PluginHost.create(loadConfig());
 * await host.start();
 * await host.activate("com.example.fmt");
 * await host.executeCommand("com.example.fmt", "format", { path: "src/a.ts" });
 * await host.shutdown();
 * ```
 */
export class PluginHost {
  readonly config: PluginHostConfig;
  readonly events: PluginEventBus;
  readonly store: ManifestStore;
  readonly installer: InstallationManager;
  readonly engine: ActivationEngine;
  readonly hostApi: HostApi;
  readonly services: HostServices;
  private readonly marketplace?: MarketplacePort;
  private readonly logger: Logger;

  static create(config: PluginHostConfig, overrides: PluginHostOverrides = {}): PluginHost {
    return new PluginHost(config, overrides);
  }

  private constructor(config: PluginHostConfig, overrides: PluginHostOverrides) {
    this.config = config;
    this.logger = overrides.logger ?? createConsoleLogger({ minLevel: config.logLevel });
    this.events =
      overrides.events ??
      new PluginEventBus({
        onListenerError: (error, event) =>
          log(this.logger, "warn", "events:listener-failed", { type: event.type, error: describeError(error) }),
      });
    this.services = createServices(config, this.logger, overrides.services);
    this.store = new ManifestStore();
    this.hostApi = new HostApi(this.services, { apiVersion: config.apiVersion, logger: this.logger });

    this.installer = new InstallationManager({
      pluginsDir: config.pluginsDir,
      hostVersion: config.hostVersion,
      store: this.store,
      source: overrides.source ?? new ArchiveBundleSourceAdapter(),
      verifier: overrides.verifier ?? new Ed25519SignatureVerifier(config.trustedKeys),
      requireSignature: config.requireSignature,
      installTimeoutMs: config.installTimeoutMs,
      events: this.events,
      logger: this.logger,
      beforeUninstall: (pluginId) => this.engine.deactivate(pluginId),
    });

    this.engine = new ActivationEngine({
      plugins: this.installer,
      loader: overrides.loader ?? new VmPluginLoaderAdapter(),
      hostApi: this.hostApi,
      hostVersion: config.hostVersion,
      apiVersion: config.apiVersion,
      environment: config.environment,
      activationTimeoutMs: config.activationTimeoutMs,
      commandTimeoutMs: config.commandTimeoutMs,
      scriptTimeoutMs: config.scriptTimeoutMs,
      events: this.events,
      logger: this.logger,
    });

    this.marketplace =
      overrides.marketplace ??
      (config.registryUrl ? new RegistryCatalogAdapter({ registryUrl: config.registryUrl, logger: this.logger }) : undefined);
  }

  /** Discovers the bundles already in the plugins directory. */
  start(): Promise<Plugin[]> {
    return this.installer.discover();
  }

  install(source: string, options?: InstallOptions): Promise<Plugin> {
    return this.installer.install(source, options);
  }

  async installFromMarketplace(pluginId: string, options?: InstallOptions): Promise<Plugin> {
    const listing = await this.requireMarketplace().getListing(pluginId);
    if (!listing) throw new InstallError(pluginId, "not found in the plugin registry");
    return this.installer.install(listing.downloadUrl, options);
  }

  uninstall(pluginId: string): Promise<void> {
    return this.installer.uninstall(pluginId);
  }

  activate(pluginId: string): Promise<PluginInstance> {
    return this.engine.activate(pluginId);
  }

  deactivate(pluginId: string): Promise<void> {
    return this.engine.deactivate(pluginId);
  }

  executeCommand(pluginId: string, command: string, args?: unknown): Promise<unknown> {
    return this.engine.executeCommand(pluginId, command, args);
  }

  getUiProvider(pluginId: string): PluginUiContribution | undefined {
    return this.engine.getUiProvider(pluginId);
  }

  listInstalled(): Plugin[] {
    return this.installer.list();
  }

  listActive(): PluginInstance[] {
    return this.engine.instances();
  }

  async listAvailable(): Promise<AvailablePlugin[]> {
    const listings = await this.requireMarketplace().listAll();
    return listings.map((listing) => this.withInstalledFlag(listing));
  }

  async search(query: string, category?: PluginCategory): Promise<AvailablePlugin[]> {
    const listings = await this.requireMarketplace().search(query, category);
    return listings.map((listing) => this.withInstalledFlag(listing));
  }

  shutdown(): Promise<void> {
    return this.engine.shutdown();
  }

  // ─── Private ────────────────────────────────────────────────────────────

  private requireMarketplace(): MarketplacePort {
    if (!this.marketplace) throw new ConfigError("no plugin registry is configured", "registryUrl");
    return this.marketplace;
  }

  private withInstalledFlag(listing: MarketplaceListing): AvailablePlugin {
    return { ...listing, installed: this.installer.has(listing.manifest.id) };
  }
}

function createServices(config: PluginHostConfig, logger: Logger, overrides: Partial<HostServices> = {}): HostServices {
  const workspace = overrides.workspace ?? new NodeWorkspaceAdapter(config.workspaceRoot);
  return {
    workspace,
    terminal:
      overrides.terminal ??
      new LocalShellTerminalAdapter({
        workspaceRoot: workspace.rootPath,
        blockedPatterns: config.blockedCommands.map((source) => new RegExp(source)),
        defaultTimeoutMs: config.commandTimeoutMs,
      }),
    network: overrides.network ?? new FetchNetworkAdapter({ allowedHosts: config.allowedHosts }),
    clipboard: overrides.clipboard ?? new InMemoryClipboardAdapter(),
    ui: overrides.ui ?? new LoggerUiAdapter(logger),
    ai: overrides.ai ?? new UnconfiguredAiCompletionAdapter(),
    editor: overrides.editor ?? new InMemoryEditorAdapter(workspace),
  };
}
