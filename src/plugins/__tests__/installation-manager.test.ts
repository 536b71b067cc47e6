// =============================================================================
// Tests — InstallationManager
// =============================================================================

import { generateKeyPairSync } from "node:crypto";
import { access, mkdir, readdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { ArchiveBundleSourceAdapter } from "../../adapters/bundle/archive-bundle-source.adapter.js";
import { Ed25519SignatureVerifier, signBundle } from "../../adapters/signature/ed25519-verifier.adapter.js";
import { IncompatibleVersionError, InstallError, NotFoundError, ParseError } from "../../errors.js";
import type { BundleSourcePort } from "../../ports/bundle.port.js";
import { createTempDir, recordingLogger, writeBundle } from "../../testing/plugin-fixtures.js";
import { InstallationManager, type InstallationManagerOptions } from "../installation-manager.js";
import { ManifestStore } from "../manifest-store.js";
import { PluginEventBus, type PluginEvent } from "../plugin-events.js";

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

describe("InstallationManager", () => {
  let root: string;
  let pluginsDir: string;
  let sourcesDir: string;
  let events: PluginEventBus;
  let seen: PluginEvent[];

  function createManager(overrides: Partial<InstallationManagerOptions> = {}): InstallationManager {
    return new InstallationManager({
      pluginsDir,
      hostVersion: "1.0.0",
      store: new ManifestStore(),
      source: new ArchiveBundleSourceAdapter(),
      verifier: new Ed25519SignatureVerifier([]),
      requireSignature: false,
      installTimeoutMs: 5_000,
      events,
      ...overrides,
    });
  }

  beforeEach(async () => {
    root = await createTempDir();
    pluginsDir = join(root, "plugins");
    sourcesDir = join(root, "sources");
    await mkdir(pluginsDir);
    await mkdir(sourcesDir);
    events = new PluginEventBus();
    seen = [];
    events.onAny((event) => seen.push(event));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  // ─── discover ───

  describe("discover", () => {
    it("loads every valid bundle and skips the rest", async () => {
      await writeBundle(pluginsDir, { dirName: "a.aicsplugin", manifest: { id: "com.example.a" } });
      await writeBundle(pluginsDir, { dirName: "b.aicsplugin", manifest: { id: "com.example.b" } });
      const broken = await writeBundle(pluginsDir, { dirName: "broken.aicsplugin" });
      await writeFile(join(broken, "manifest.json"), "{ nope", "utf-8");
      const duplicate = await writeBundle(pluginsDir, { dirName: "dup.aicsplugin", manifest: { id: "com.example.a" } });
      await writeBundle(pluginsDir, { dirName: "ignored-folder", manifest: { id: "com.example.c" } });

      const { logger, entries } = recordingLogger();
      const manager = createManager({ logger });
      const plugins = await manager.discover();

      expect(plugins.map((p) => p.manifest.id)).toEqual(["com.example.a", "com.example.b"]);
      expect(manager.list().map((p) => p.manifest.id)).toEqual(["com.example.a", "com.example.b"]);

      const skipped = seen.filter((event) => event.type === "plugin:skipped").map((event) => event.data);
      expect(skipped).toEqual([
        { bundlePath: broken, reason: "Manifest is not valid JSON" },
        {
          bundlePath: duplicate,
          reason: `Duplicate plugin id "com.example.a" (already provided by ${join(pluginsDir, "a.aicsplugin")})`,
        },
      ]);
      expect(entries.filter((entry) => entry.event === "discover:skipped")).toHaveLength(2);
    });

    it("treats a missing plugins directory as empty", async () => {
      const manager = createManager({ pluginsDir: join(root, "does-not-exist") });
      await expect(manager.discover()).resolves.toEqual([]);
    });

    it("replaces the installed set on rescan", async () => {
      const bundle = await writeBundle(pluginsDir, { manifest: { id: "com.example.a" } });
      const manager = createManager();
      await manager.discover();
      await rm(bundle, { recursive: true });
      await manager.discover();
      expect(manager.has("com.example.a")).toBe(false);
    });

    it("retires plugins that vanished or changed version, and keeps the rest", async () => {
      const gone = await writeBundle(pluginsDir, { dirName: "a.aicsplugin", manifest: { id: "com.example.a" } });
      const bumped = await writeBundle(pluginsDir, { dirName: "b.aicsplugin", manifest: { id: "com.example.b" } });
      await writeBundle(pluginsDir, { dirName: "c.aicsplugin", manifest: { id: "com.example.c" } });
      const resolvedDuringRetire: Array<string | undefined> = [];
      const retired: string[] = [];
      const manager: InstallationManager = createManager({
        beforeUninstall: async (pluginId) => {
          retired.push(pluginId);
          resolvedDuringRetire.push(manager.resolve(pluginId)?.manifest.id);
        },
      });
      await manager.discover();

      await rm(gone, { recursive: true });
      await rm(bumped, { recursive: true });
      await writeBundle(pluginsDir, { dirName: "b.aicsplugin", manifest: { id: "com.example.b", version: "1.1.0" } });
      await manager.discover();

      expect(retired).toEqual(["com.example.a", "com.example.b"]);
      expect(resolvedDuringRetire).toEqual([undefined, undefined]);
      expect(manager.list().map((p) => `${p.manifest.id}@${p.manifest.version}`)).toEqual([
        "com.example.b@1.1.0",
        "com.example.c@1.0.0",
      ]);
      expect(manager.resolve("com.example.b")?.manifest.version).toBe("1.1.0");
    });

    it("keeps a plugin installed while a rescan runs", async () => {
      const manager = createManager();
      const source = await writeBundle(sourcesDir, { manifest: { id: "com.example.a" } });

      await Promise.all([manager.install(source), manager.discover()]);

      expect(manager.has("com.example.a")).toBe(true);
      await manager.discover();
      expect(manager.has("com.example.a")).toBe(true);
    });
  });

  // ─── install ───

  describe("install", () => {
    it("moves the bundle into the plugins directory and registers it", async () => {
      const source = await writeBundle(sourcesDir, { entry: "module.exports = { commands: {} };\n" });
      const manager = createManager();

      const plugin = await manager.install(source);

      const target = join(pluginsDir, "com.example.hello.aicsplugin");
      expect(plugin.bundlePath).toBe(target);
      expect(plugin.entryPath).toBe(join(target, "main.js"));
      expect(manager.get("com.example.hello")).toEqual(plugin);
      expect(await readdir(pluginsDir)).toEqual(["com.example.hello.aicsplugin"]);
      expect(seen.map((event) => event.type)).toEqual(["plugin:installed"]);
    });

    it("rejects a bundle that needs a newer host and leaves nothing behind", async () => {
      const source = await writeBundle(sourcesDir, { manifest: { minimumAppVersion: "9.0.0" } });
      const manager = createManager();

      await expect(manager.install(source)).rejects.toBeInstanceOf(IncompatibleVersionError);
      expect(manager.has("com.example.hello")).toBe(false);
      expect(await readdir(pluginsDir)).toEqual([]);
    });

    it("rejects an id that is already installed", async () => {
      const source = await writeBundle(sourcesDir);
      const manager = createManager();
      await manager.install(source);

      await expect(manager.install(source)).rejects.toThrow(
        `Cannot install "${source}": plugin "com.example.hello" is already installed`,
      );
      expect(await readdir(pluginsDir)).toEqual(["com.example.hello.aicsplugin"]);
    });

    it("wraps manifest errors in InstallError", async () => {
      const source = await writeBundle(sourcesDir);
      await writeFile(join(source, "manifest.json"), JSON.stringify({ id: "com.example.hello" }), "utf-8");
      const manager = createManager();

      const error = await manager.install(source).catch((err: unknown) => err);
      expect(error).toBeInstanceOf(InstallError);
      expect(error instanceof InstallError && error.cause).toBeInstanceOf(ParseError);
      expect(await readdir(pluginsDir)).toEqual([]);
    });

    it("fails on a source that does not exist", async () => {
      const missing = join(sourcesDir, "missing.aicsplugin");
      await expect(createManager().install(missing)).rejects.toThrow(
        `Cannot install "${missing}": source does not exist`,
      );
    });

    it("stops when the caller cancels", async () => {
      const source = await writeBundle(sourcesDir);
      const controller = new AbortController();
      controller.abort();

      await expect(createManager().install(source, { signal: controller.signal })).rejects.toThrow(
        `Cannot install "${source}": installation was cancelled`,
      );
      expect(await readdir(pluginsDir)).toEqual([]);
    });

    it("gives up when the source hangs past the timeout", async () => {
      const hanging: BundleSourcePort = {
        fetchInto: (_location, _targetDir, signal) =>
          new Promise<void>((_resolve, reject) => {
            signal.addEventListener("abort", () => reject(signal.reason));
          }),
      };
      const manager = createManager({ source: hanging });

      await expect(manager.install("https://example.com/slow.zip", { timeoutMs: 20 })).rejects.toThrow(
        'Cannot install "https://example.com/slow.zip": installation timed out after 20ms',
      );
      expect(await readdir(pluginsDir)).toEqual([]);
    });

    // ─── signatures ───

    it("requires a signature when configured to", async () => {
      const source = await writeBundle(sourcesDir);
      const manager = createManager({ requireSignature: true });
      await expect(manager.install(source)).rejects.toThrow(`Cannot install "${source}": bundle is not signed`);
    });

    it("accepts a bundle signed by a trusted key", async () => {
      const { publicKey, privateKey } = generateKeyPairSync("ed25519");
      const source = await writeBundle(sourcesDir);
      await signBundle(source, privateKey.export({ type: "pkcs8", format: "pem" }).toString());

      const manager = createManager({
        requireSignature: true,
        verifier: new Ed25519SignatureVerifier([publicKey.export({ type: "spki", format: "pem" }).toString()]),
      });

      const plugin = await manager.install(source);
      expect(await exists(join(plugin.bundlePath, "bundle.sig"))).toBe(true);
    });

    it("rejects a signed bundle whose files changed after signing", async () => {
      const { publicKey, privateKey } = generateKeyPairSync("ed25519");
      const source = await writeBundle(sourcesDir);
      await signBundle(source, privateKey.export({ type: "pkcs8", format: "pem" }).toString());
      await writeFile(join(source, "main.js"), "module.exports = { tampered: true };\n", "utf-8");

      const manager = createManager({
        verifier: new Ed25519SignatureVerifier([publicKey.export({ type: "spki", format: "pem" }).toString()]),
      });

      await expect(manager.install(source)).rejects.toThrow("signature does not match any trusted key");
      expect(manager.has("com.example.hello")).toBe(false);
    });
  });

  // ─── uninstall ───

  describe("uninstall", () => {
    it("deactivates, deletes the bundle and forgets the plugin", async () => {
      const beforeUninstall = vi.fn(async (_pluginId: string) => {});
      const manager = createManager({ beforeUninstall });
      const plugin = await manager.install(await writeBundle(sourcesDir));

      let visibleDuringRemoval: boolean | undefined;
      beforeUninstall.mockImplementation(async (pluginId: string) => {
        visibleDuringRemoval = manager.resolve(pluginId) !== undefined;
      });

      await manager.uninstall("com.example.hello");

      expect(beforeUninstall).toHaveBeenCalledWith("com.example.hello");
      expect(visibleDuringRemoval).toBe(false);
      expect(manager.has("com.example.hello")).toBe(false);
      expect(await exists(plugin.bundlePath)).toBe(false);
      expect(seen.map((event) => event.type)).toEqual(["plugin:installed", "plugin:uninstalled"]);
    });

    it("fails for an unknown id", async () => {
      await expect(createManager().uninstall("com.example.nope")).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});
