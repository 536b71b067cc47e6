// =============================================================================
// ActivationEngine — Loads, activates and deactivates installed plugins
// =============================================================================

import { parseCommandArgs } from "../domain/host-command.schema.js";
import { isHostCompatible } from "../domain/version.js";
import {
  describeError,
  IncompatibleVersionError,
  LoadError,
  NotFoundError,
  PluginCommandError,
  PluginHostError,
  PluginTimeoutError,
} from "../errors.js";
import { log, silentLogger, type Logger } from "../logging.js";
import type { PluginHostApi } from "../ports/host-api.port.js";
import type {
  Plugin,
  PluginContext,
  PluginEnvironment,
  PluginInstance,
  PluginLoaderPort,
  PluginModule,
  PluginState,
  PluginUiContribution,
} from "../ports/plugin.port.js";
import { KeyedSerialQueue } from "../utils/keyed-queue.js";
import { withTimeout } from "../utils/with-timeout.js";
import type { PluginEventBus } from "./plugin-events.js";

const DEPENDENCY_CYCLE = "DEPENDENCY_CYCLE";

/** Read side of the installed set; plugins being uninstalled resolve to `undefined` */
export interface InstalledPlugins {
  resolve(pluginId: string): Plugin | undefined;
}

export interface HostApiProvider {
  /** `isLive` turns false when the activation the handle belongs to has ended */
  forPlugin(plugin: Plugin, isLive: () => boolean): PluginHostApi;
}

/** One activation of a plugin; handles issued during it die with it */
interface ActivationSession {
  live: boolean;
  host?: PluginHostApi;
}

export interface ActivationEngineOptions {
  plugins: InstalledPlugins;
  loader: PluginLoaderPort;
  hostApi: HostApiProvider;
  hostVersion: string;
  apiVersion: string;
  environment: PluginEnvironment;
  /** Bound for the activate and deactivate hooks */
  activationTimeoutMs: number;
  commandTimeoutMs: number;
  /** Bound for synchronous evaluation of an entry file */
  scriptTimeoutMs: number;
  events?: PluginEventBus;
  logger?: Logger;
}

/**
 * Per plugin: inactive → activating → active → deactivating → inactive.
 *
 * Activation, deactivation and command dispatch for one id are serialized;
 * different ids proceed concurrently. The registry of active instances is
 * replaced on every change, so readers always see a whole snapshot.
 * Host API handles are tied to the activation that issued them and reject
 * calls once it has been torn down.
 */
export class ActivationEngine {
  private readonly opts: ActivationEngineOptions;
  private readonly logger: Logger;
  private readonly queue = new KeyedSerialQueue();
  private registry: ReadonlyMap<string, PluginInstance> = new Map();
  private readonly transient = new Map<string, PluginState>();
  private readonly sessions = new Map<string, ActivationSession>();

  constructor(options: ActivationEngineOptions) {
    this.opts = options;
    this.logger = options.logger ?? silentLogger;
  }

  /** Activates `pluginId` and its dependencies. Returns the live instance if already active. */
  activate(pluginId: string): Promise<PluginInstance> {
    return this.activateWithin(pluginId, []);
  }

  /** No-op unless the plugin is active. Cleanup hook failures are logged, never thrown. */
  async deactivate(pluginId: string): Promise<void> {
    await this.queue.run(pluginId, async () => {
      const instance = this.registry.get(pluginId);
      if (!instance) return;

      this.transition(pluginId, "active", "deactivating");
      await this.runCleanup(pluginId, instance.module);
      this.endSession(pluginId);

      const next = new Map(this.registry);
      next.delete(pluginId);
      this.registry = next;
      this.transition(pluginId, "deactivating", "inactive");
      log(this.logger, "info", "deactivate:completed", undefined, pluginId);
    });
  }

  /**
   * Runs a command exported by an active plugin. Resolves to `undefined` when
   * the plugin is not active or exports no such command.
   */
  async executeCommand(pluginId: string, command: string, args?: unknown): Promise<unknown> {
    return this.queue.run(pluginId, async () => {
      const instance = this.registry.get(pluginId);
      const handler = instance?.module.commands.get(command);
      if (!instance || !handler) {
        log(this.logger, "debug", "command:unavailable", { command, active: instance !== undefined }, pluginId);
        return undefined;
      }

      const input = parseCommandArgs(args);
      const host = this.hostFor(instance.plugin);
      const timeoutMs = this.opts.commandTimeoutMs;

      try {
        return await withTimeout(
          (async () => handler(input, host))(),
          timeoutMs,
          () => new PluginTimeoutError(pluginId, `command "${command}"`, timeoutMs),
        );
      } catch (err) {
        log(this.logger, "warn", "command:failed", { command, error: describeError(err) }, pluginId);
        if (err instanceof PluginHostError) throw err;
        throw new PluginCommandError(pluginId, command, describeError(err), { cause: err });
      }
    });
  }

  getUiProvider(pluginId: string): PluginUiContribution | undefined {
    return this.registry.get(pluginId)?.uiProvider;
  }

  getState(pluginId: string): PluginState {
    return this.transient.get(pluginId) ?? (this.registry.has(pluginId) ? "active" : "inactive");
  }

  getInstance(pluginId: string): PluginInstance | undefined {
    return this.registry.get(pluginId);
  }

  isActive(pluginId: string): boolean {
    return this.registry.has(pluginId);
  }

  /** Active ids in activation order */
  activeIds(): string[] {
    return [...this.registry.keys()];
  }

  instances(): PluginInstance[] {
    return [...this.registry.values()];
  }

  /** Waits for in-flight work, then deactivates everything, most recent first. */
  async shutdown(): Promise<void> {
    await this.queue.drain();
    for (const pluginId of this.activeIds().reverse()) {
      await this.deactivate(pluginId);
    }
    log(this.logger, "info", "shutdown:completed");
  }

  // ─── Private ────────────────────────────────────────────────────────────

  private async activateWithin(pluginId: string, chain: readonly string[]): Promise<PluginInstance> {
    if (chain.includes(pluginId)) {
      const root = chain[0] ?? pluginId;
      throw new LoadError(root, `dependency cycle ${[...chain, pluginId].join(" -> ")}`, { code: DEPENDENCY_CYCLE });
    }

    const plugin = this.opts.plugins.resolve(pluginId);
    if (!plugin) throw new NotFoundError(pluginId);

    const live = this.registry.get(pluginId);
    if (live) return live;

    const { manifest } = plugin;
    if (!isHostCompatible(manifest.minimumAppVersion, this.opts.hostVersion)) {
      throw new IncompatibleVersionError(pluginId, manifest.minimumAppVersion, this.opts.hostVersion);
    }

    for (const dependency of manifest.dependencies ?? []) {
      if (!this.opts.plugins.resolve(dependency)) {
        throw new LoadError(pluginId, `dependency "${dependency}" is not installed`);
      }
      try {
        await this.activateWithin(dependency, [...chain, pluginId]);
      } catch (err) {
        if (err instanceof LoadError && err.code === DEPENDENCY_CYCLE) throw err;
        throw new LoadError(pluginId, `dependency "${dependency}" failed to activate: ${describeError(err)}`, {
          cause: err,
        });
      }
    }

    return this.queue.run(pluginId, () => this.load(pluginId));
  }

  private async load(pluginId: string): Promise<PluginInstance> {
    // Re-checked under the lock: an uninstall or another activation may have won the race.
    const plugin = this.opts.plugins.resolve(pluginId);
    if (!plugin) throw new NotFoundError(pluginId);
    const live = this.registry.get(pluginId);
    if (live) return live;

    this.transition(pluginId, "inactive", "activating");
    this.sessions.set(pluginId, { live: true });
    let module: PluginModule | undefined;

    try {
      module = await this.opts.loader.load(plugin, { timeoutMs: this.opts.scriptTimeoutMs, logger: this.logger });

      const context: PluginContext = Object.freeze({
        apiVersion: this.opts.apiVersion,
        appVersion: this.opts.hostVersion,
        environment: this.opts.environment,
      });
      const host = this.hostFor(plugin);
      const hooks = module;
      const timeoutMs = this.opts.activationTimeoutMs;
      await withTimeout(
        (async () => hooks.activate?.(context, host))(),
        timeoutMs,
        () => new PluginTimeoutError(pluginId, "activation", timeoutMs),
      );

      const instance: PluginInstance = Object.freeze({
        plugin,
        state: "active",
        module,
        uiProvider: module.ui,
        activatedAt: Date.now(),
      });
      this.registry = new Map(this.registry).set(pluginId, instance);
      this.transition(pluginId, "activating", "active");
      log(this.logger, "info", "activate:completed", { version: plugin.manifest.version }, pluginId);
      return instance;
    } catch (err) {
      if (module) await this.runCleanup(pluginId, module);
      this.endSession(pluginId);
      this.transition(pluginId, "activating", "inactive");
      log(this.logger, "warn", "activate:failed", { error: describeError(err) }, pluginId);
      if (err instanceof LoadError || err instanceof IncompatibleVersionError) throw err;
      throw new LoadError(pluginId, describeError(err), { cause: err });
    }
  }

  /** One handle per activation, shared by its hooks and commands */
  private hostFor(plugin: Plugin): PluginHostApi {
    const session: ActivationSession = this.sessions.get(plugin.manifest.id) ?? { live: false };
    session.host ??= this.opts.hostApi.forPlugin(plugin, () => session.live);
    return session.host;
  }

  private endSession(pluginId: string): void {
    const session = this.sessions.get(pluginId);
    if (session) session.live = false;
    this.sessions.delete(pluginId);
  }

  private async runCleanup(pluginId: string, module: PluginModule): Promise<void> {
    if (!module.deactivate) return;
    const timeoutMs = this.opts.activationTimeoutMs;
    try {
      await withTimeout(
        (async () => module.deactivate?.())(),
        timeoutMs,
        () => new PluginTimeoutError(pluginId, "deactivation", timeoutMs),
      );
    } catch (err) {
      log(this.logger, "warn", "deactivate:hook-failed", { error: describeError(err) }, pluginId);
    }
  }

  private transition(pluginId: string, from: PluginState, to: PluginState): void {
    if (to === "inactive" || to === "active") {
      this.transient.delete(pluginId);
    } else {
      this.transient.set(pluginId, to);
    }
    this.opts.events?.emit("plugin:state", { pluginId, from, to });
  }
}
