// =============================================================================
// ArchiveBundleSourceAdapter — Directory copy, zip extraction and URL download
// =============================================================================

import type { Stats } from "node:fs";
import { cp, mkdir, readFile, stat, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import JSZip from "jszip";

import { isContainedRelativePath, MANIFEST_FILE } from "../../domain/manifest.schema.js";
import { describeError, InstallError } from "../../errors.js";
import type { BundleSourcePort } from "../../ports/bundle.port.js";

/** Default upper bound on an archive's uncompressed size (64MB) */
const DEFAULT_MAX_EXTRACTED_BYTES = 64 * 1024 * 1024;
/** Default upper bound on a downloaded or local archive file (32MB) */
const DEFAULT_MAX_ARCHIVE_BYTES = 32 * 1024 * 1024;

export interface ArchiveBundleSourceOptions {
  maxExtractedBytes?: number;
  maxArchiveBytes?: number;
}

export class ArchiveBundleSourceAdapter implements BundleSourcePort {
  private readonly maxExtractedBytes: number;
  private readonly maxArchiveBytes: number;

  constructor(options?: ArchiveBundleSourceOptions) {
    this.maxExtractedBytes = options?.maxExtractedBytes ?? DEFAULT_MAX_EXTRACTED_BYTES;
    this.maxArchiveBytes = options?.maxArchiveBytes ?? DEFAULT_MAX_ARCHIVE_BYTES;
  }

  async fetchInto(location: string, targetDir: string, signal: AbortSignal): Promise<void> {
    signal.throwIfAborted();

    if (/^https?:\/\//i.test(location)) {
      const archive = await this.download(location, signal);
      await this.extract(location, archive, targetDir, signal);
      return;
    }

    let info: Stats;
    try {
      info = await stat(location);
    } catch (err) {
      throw new InstallError(location, "source does not exist", { cause: err });
    }

    if (info.isDirectory()) {
      await cp(location, targetDir, { recursive: true, errorOnExist: false });
      signal.throwIfAborted();
      return;
    }
    if (info.size > this.maxArchiveBytes) {
      throw new InstallError(location, `archive exceeds ${this.maxArchiveBytes} bytes`);
    }

    const archive = await readFile(location, { signal });
    await this.extract(location, archive, targetDir, signal);
  }

  // ─── Private ────────────────────────────────────────────────────────────

  private async download(url: string, signal: AbortSignal): Promise<Uint8Array> {
    let response: Response;
    try {
      response = await fetch(url, { signal });
    } catch (err) {
      if (signal.aborted) throw err;
      throw new InstallError(url, `download failed: ${describeError(err)}`, {
        cause: err,
      });
    }

    if (!response.ok) {
      throw new InstallError(url, `download returned HTTP ${response.status}: ${response.statusText}`);
    }

    const declared = Number(response.headers.get("content-length"));
    if (declared > this.maxArchiveBytes) {
      await response.body?.cancel();
      throw new InstallError(url, `archive exceeds ${this.maxArchiveBytes} bytes`);
    }
    return this.readCapped(url, response);
  }

  /** Reads the body in chunks, giving up as soon as it passes `maxArchiveBytes`. */
  private async readCapped(url: string, response: Response): Promise<Uint8Array> {
    if (!response.body) return new Uint8Array();
    const reader = response.body.getReader();
    const chunks: Uint8Array[] = [];
    let received = 0;

    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      received += value.byteLength;
      if (received > this.maxArchiveBytes) {
        await reader.cancel();
        throw new InstallError(url, `archive exceeds ${this.maxArchiveBytes} bytes`);
      }
      chunks.push(value);
    }

    const archive = new Uint8Array(received);
    let offset = 0;
    for (const chunk of chunks) {
      archive.set(chunk, offset);
      offset += chunk.byteLength;
    }
    return archive;
  }

  private async extract(source: string, archive: Uint8Array, targetDir: string, signal: AbortSignal): Promise<void> {
    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(archive);
    } catch (err) {
      throw new InstallError(source, "archive is not a valid zip file", { cause: err });
    }

    const entries = Object.values(zip.files).filter((entry) => !entry.dir);
    const names = entries.map((entry) => entry.name.replace(/\\/g, "/"));
    const prefix = commonBundleFolder(names);

    let extracted = 0;
    for (const [index, entry] of entries.entries()) {
      signal.throwIfAborted();

      const name = (names[index] ?? entry.name).slice(prefix.length);
      if (!isContainedRelativePath(name)) {
        throw new InstallError(source, `archive entry "${entry.name}" escapes the bundle root`);
      }

      const content = await entry.async("uint8array");
      extracted += content.byteLength;
      if (extracted > this.maxExtractedBytes) {
        throw new InstallError(source, `archive expands beyond ${this.maxExtractedBytes} bytes`);
      }

      const destination = join(targetDir, ...name.split("/"));
      await mkdir(dirname(destination), { recursive: true });
      await writeFile(destination, content);
    }
  }
}

/**
 * Archives often wrap the bundle in one top-level folder. Returns that folder
 * (with trailing slash) when the manifest is not already at the root.
 */
export function commonBundleFolder(names: readonly string[]): string {
  if (names.length === 0 || names.includes(MANIFEST_FILE)) return "";
  const first = names[0] ?? "";
  const slash = first.indexOf("/");
  if (slash <= 0) return "";
  const prefix = first.slice(0, slash + 1);
  return names.every((name) => name.startsWith(prefix)) ? prefix : "";
}
