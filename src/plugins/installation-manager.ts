// =============================================================================
// InstallationManager — Discovers, installs and removes plugin bundles
// =============================================================================

import { randomUUID } from "node:crypto";
import type { Dirent } from "node:fs";
import { mkdir, readdir, rename, rm, stat } from "node:fs/promises";
import { join, resolve } from "node:path";

import { BUNDLE_EXTENSION } from "../domain/manifest.schema.js";
import { isHostCompatible } from "../domain/version.js";
import {
  describeError,
  IncompatibleVersionError,
  InstallError,
  NotFoundError,
  ParseError,
  PluginHostError,
} from "../errors.js";
import { log, silentLogger, type Logger } from "../logging.js";
import type { BundleSourcePort, SignatureVerifierPort } from "../ports/bundle.port.js";
import type { Plugin } from "../ports/plugin.port.js";
import { KeyedSerialQueue } from "../utils/keyed-queue.js";
import { ManifestStore, readBundle } from "./manifest-store.js";
import type { PluginEventBus } from "./plugin-events.js";

const STAGING_PREFIX = ".staging-";
/** Lock key shared by every change to the installed set */
const REGISTRY = "registry";

export interface InstallationManagerOptions {
  /** Directory holding one `<id>.aicsplugin` directory per installed plugin */
  pluginsDir: string;
  hostVersion: string;
  store: ManifestStore;
  source: BundleSourcePort;
  verifier: SignatureVerifierPort;
  requireSignature: boolean;
  installTimeoutMs: number;
  events?: PluginEventBus;
  logger?: Logger;
  /** Runs before an uninstalled plugin's bundle is deleted */
  beforeUninstall?: (pluginId: string) => Promise<void>;
}

export interface InstallOptions {
  signal?: AbortSignal;
  /** Overrides the configured install timeout */
  timeoutMs?: number;
}

export class InstallationManager {
  readonly pluginsDir: string;
  private readonly opts: InstallationManagerOptions;
  private readonly store: ManifestStore;
  private readonly logger: Logger;
  private readonly lock = new KeyedSerialQueue();
  /** Ids whose bundle is being deleted; hidden from `resolve` */
  private removing: ReadonlySet<string> = new Set();

  constructor(options: InstallationManagerOptions) {
    this.opts = options;
    this.pluginsDir = resolve(options.pluginsDir);
    this.store = options.store;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Scans `directory` for `*.aicsplugin` bundles and replaces the installed
   * set with what it finds. Bundles that fail to load are skipped. Plugins
   * that vanished from disk, or whose version changed, are deactivated
   * before the set is replaced.
   */
  async discover(directory: string = this.pluginsDir): Promise<Plugin[]> {
    return this.lock.run(REGISTRY, async () => {
      const plugins = await this.scan(directory);
      const found = new Map(plugins.map((plugin) => [plugin.manifest.id, plugin]));
      const stale = this.store
        .list()
        .filter((plugin) => found.get(plugin.manifest.id)?.manifest.version !== plugin.manifest.version)
        .map((plugin) => plugin.manifest.id);

      await this.withRemoving(stale, async () => {
        for (const pluginId of stale) {
          await this.opts.beforeUninstall?.(pluginId);
          log(this.logger, "info", "discover:retired", { present: found.has(pluginId) }, pluginId);
        }
        this.store.reset(plugins);
      });

      log(this.logger, "info", "discover:completed", { directory, count: plugins.length });
      return plugins;
    });
  }

  /**
   * Installs the bundle at `source` (directory, archive or URL). All or
   * nothing: on any failure the staging directory is removed and nothing is
   * registered.
   */
  async install(source: string, options: InstallOptions = {}): Promise<Plugin> {
    const timeoutMs = options.timeoutMs ?? this.opts.installTimeoutMs;
    const deadline = AbortSignal.timeout(timeoutMs);
    const signal = options.signal ? AbortSignal.any([options.signal, deadline]) : deadline;
    const checkAborted = (): void => {
      if (signal.aborted) throw abortError(source, options.signal, timeoutMs);
    };

    await mkdir(this.pluginsDir, { recursive: true });
    const staging = join(this.pluginsDir, `${STAGING_PREFIX}${randomUUID()}`);
    await mkdir(staging);
    log(this.logger, "debug", "install:staged", { source, staging });

    try {
      checkAborted();
      await this.opts.source.fetchInto(source, staging, signal);
      checkAborted();

      let staged: Plugin;
      try {
        staged = await readBundle(staging);
      } catch (err) {
        if (err instanceof ParseError) {
          throw new InstallError(source, `invalid bundle: ${err.message}`, { cause: err });
        }
        throw err;
      }

      const { manifest } = staged;
      if (!isHostCompatible(manifest.minimumAppVersion, this.opts.hostVersion)) {
        throw new IncompatibleVersionError(manifest.id, manifest.minimumAppVersion, this.opts.hostVersion);
      }

      const signature = await this.opts.verifier.verify(staging, { required: this.opts.requireSignature, source });
      checkAborted();

      return await this.lock.run(REGISTRY, async () => {
        checkAborted();
        if (this.store.has(manifest.id)) {
          throw new InstallError(source, `plugin "${manifest.id}" is already installed`);
        }
        const target = join(this.pluginsDir, `${manifest.id}${BUNDLE_EXTENSION}`);
        if (await pathExists(target)) {
          throw new InstallError(source, `${target} already exists`);
        }

        await rename(staging, target);
        const plugin: Plugin = { manifest, bundlePath: target, entryPath: resolve(target, manifest.entryPoint) };
        this.store.register(plugin);

        log(this.logger, "info", "install:completed", { version: manifest.version, signature: signature.status }, manifest.id);
        this.opts.events?.emit("plugin:installed", { pluginId: manifest.id, version: manifest.version });
        return plugin;
      });
    } catch (err) {
      await rm(staging, { recursive: true, force: true });
      const error = toInstallFailure(err, source, signal, options.signal, timeoutMs);
      log(this.logger, "warn", "install:failed", { source, error: error.message });
      throw error;
    }
  }

  /** Deactivates the plugin if needed, deletes its bundle and forgets it. */
  async uninstall(pluginId: string): Promise<void> {
    await this.lock.run(REGISTRY, async () => {
      const plugin = this.store.get(pluginId);
      if (!plugin) throw new NotFoundError(pluginId);

      await this.withRemoving([pluginId], async () => {
        await this.opts.beforeUninstall?.(pluginId);
        await rm(plugin.bundlePath, { recursive: true, force: true });
        this.store.unregister(pluginId);
      });

      log(this.logger, "info", "uninstall:completed", { bundlePath: plugin.bundlePath }, pluginId);
      this.opts.events?.emit("plugin:uninstalled", { pluginId });
    });
  }

  get(pluginId: string): Plugin | undefined {
    return this.store.get(pluginId);
  }

  has(pluginId: string): boolean {
    return this.store.has(pluginId);
  }

  list(): Plugin[] {
    return this.store.list();
  }

  /** Installed plugin that may still be activated; `undefined` while it is being removed */
  resolve(pluginId: string): Plugin | undefined {
    if (this.removing.has(pluginId)) return undefined;
    return this.store.get(pluginId);
  }

  // ─── Private ────────────────────────────────────────────────────────────

  private async scan(directory: string): Promise<Plugin[]> {
    let entries: Dirent[];
    try {
      entries = await readdir(directory, { withFileTypes: true });
    } catch (err) {
      if (!isMissingFile(err)) throw err;
      log(this.logger, "debug", "discover:missing-directory", { directory });
      entries = [];
    }

    const found = new ManifestStore();
    const bundles = entries
      .filter((entry) => entry.name.endsWith(BUNDLE_EXTENSION))
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of bundles) {
      const bundlePath = join(directory, entry.name);
      if (!entry.isDirectory()) {
        this.skip(bundlePath, "not a directory");
        continue;
      }
      try {
        const plugin = await readBundle(bundlePath);
        found.register(plugin);
        this.opts.events?.emit("plugin:discovered", { pluginId: plugin.manifest.id, bundlePath: plugin.bundlePath });
      } catch (err) {
        this.skip(bundlePath, describeError(err));
      }
    }
    return found.list();
  }

  /** Hides `pluginIds` from `resolve` while `fn` runs, so nothing reactivates them midway */
  private async withRemoving(pluginIds: readonly string[], fn: () => Promise<void>): Promise<void> {
    if (pluginIds.length === 0) return fn();
    this.removing = new Set([...this.removing, ...pluginIds]);
    try {
      await fn();
    } finally {
      const next = new Set(this.removing);
      for (const pluginId of pluginIds) next.delete(pluginId);
      this.removing = next;
    }
  }

  private skip(bundlePath: string, reason: string): void {
    log(this.logger, "warn", "discover:skipped", { bundlePath, reason });
    this.opts.events?.emit("plugin:skipped", { bundlePath, reason });
  }
}

function abortError(source: string, callerSignal: AbortSignal | undefined, timeoutMs: number): InstallError {
  return callerSignal?.aborted
    ? new InstallError(source, "installation was cancelled")
    : new InstallError(source, `installation timed out after ${timeoutMs}ms`);
}

function toInstallFailure(
  err: unknown,
  source: string,
  signal: AbortSignal,
  callerSignal: AbortSignal | undefined,
  timeoutMs: number,
): PluginHostError {
  if (err instanceof PluginHostError) return err;
  if (signal.aborted) return abortError(source, callerSignal, timeoutMs);
  return new InstallError(source, describeError(err), { cause: err });
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (err) {
    if (isMissingFile(err)) return false;
    throw err;
  }
}
