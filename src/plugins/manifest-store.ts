// =============================================================================
// ManifestStore — Parsed manifests keyed by plugin id
// =============================================================================

import { readFile, realpath, stat } from "node:fs/promises";
import { join, resolve } from "node:path";

import { MANIFEST_FILE, parseManifest, type PluginManifest } from "../domain/manifest.schema.js";
import { ParseError } from "../errors.js";
import type { Plugin } from "../ports/plugin.port.js";
import { isPathInside } from "../utils/paths.js";

/**
 * Reads `manifest.json` from a bundle directory and binds it to the bundle.
 * The entry point must name an existing file inside the bundle once symlinks
 * are resolved.
 */
export async function readBundle(bundlePath: string): Promise<Plugin> {
  const root = resolve(bundlePath);

  let bytes: Uint8Array;
  try {
    bytes = await readFile(join(root, MANIFEST_FILE));
  } catch (err) {
    throw new ParseError(`Cannot read ${MANIFEST_FILE} in ${root}`, [], { cause: err });
  }

  const manifest = parseManifest(bytes);
  const entryPath = resolve(root, manifest.entryPoint);

  let realEntry: string;
  try {
    realEntry = await realpath(entryPath);
  } catch (err) {
    throw new ParseError(`Entry point "${manifest.entryPoint}" does not exist in ${root}`, [], { cause: err });
  }

  if (!isPathInside(await realpath(root), realEntry)) {
    throw new ParseError(`Entry point "${manifest.entryPoint}" resolves outside the bundle root`);
  }
  if (!(await stat(realEntry)).isFile()) {
    throw new ParseError(`Entry point "${manifest.entryPoint}" is not a file`);
  }

  return { manifest, bundlePath: root, entryPath };
}

export class ManifestStore {
  private plugins: ReadonlyMap<string, Plugin> = new Map();

  parse(bytes: Uint8Array | string): PluginManifest {
    return parseManifest(bytes);
  }

  /** Rejects a manifest whose id is already known, unless it is the same bundle. */
  register(plugin: Plugin): void {
    const { id } = plugin.manifest;
    const existing = this.plugins.get(id);
    if (existing && existing.bundlePath !== plugin.bundlePath) {
      throw new ParseError(`Duplicate plugin id "${id}" (already provided by ${existing.bundlePath})`);
    }
    const next = new Map(this.plugins);
    next.set(id, plugin);
    this.plugins = next;
  }

  unregister(id: string): boolean {
    if (!this.plugins.has(id)) return false;
    const next = new Map(this.plugins);
    next.delete(id);
    this.plugins = next;
    return true;
  }

  /** Replaces every known manifest at once; discovery rebuilds the store this way. */
  reset(plugins: readonly Plugin[]): void {
    const next = new ManifestStore();
    for (const plugin of plugins) next.register(plugin);
    this.plugins = next.plugins;
  }

  get(id: string): Plugin | undefined {
    return this.plugins.get(id);
  }

  has(id: string): boolean {
    return this.plugins.has(id);
  }

  list(): Plugin[] {
    return [...this.plugins.values()];
  }
}
