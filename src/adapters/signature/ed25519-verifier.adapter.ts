// =============================================================================
// Ed25519SignatureVerifier — Detached bundle signatures over a content digest
// =============================================================================

import { createHash, createPrivateKey, createPublicKey, sign, verify, type KeyObject } from "node:crypto";
import { readdir, readFile, readlink, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { ConfigError, describeError, InstallError } from "../../errors.js";
import { SIGNATURE_FILE, type SignatureStatus, type SignatureVerifierPort } from "../../ports/bundle.port.js";

/**
 * SHA-256 over every regular file and symbolic link in the bundle except the
 * signature itself. Entries are visited in sorted POSIX-path order; a file
 * contributes `path\0sha256hex\n` and a link `path\0link:sha256hex(target)\n`,
 * so renames, content changes and retargeted links all alter the digest.
 */
export async function computeBundleDigest(bundleDir: string): Promise<Buffer> {
  const entries = await listEntries(bundleDir, "");
  entries.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));

  const digest = createHash("sha256");
  for (const entry of entries) {
    if (entry.path === SIGNATURE_FILE) continue;
    const absolute = join(bundleDir, ...entry.path.split("/"));
    if (entry.kind === "link") {
      const target = await readlink(absolute);
      digest.update(`${entry.path}\0link:${sha256Hex(target)}\n`);
    } else {
      digest.update(`${entry.path}\0${sha256Hex(await readFile(absolute))}\n`);
    }
  }
  return digest.digest();
}

interface BundleEntry {
  path: string;
  kind: "file" | "link";
}

async function listEntries(root: string, prefix: string): Promise<BundleEntry[]> {
  const dirents = await readdir(join(root, ...prefix.split("/").filter(Boolean)), { withFileTypes: true });
  const entries: BundleEntry[] = [];
  for (const dirent of dirents) {
    const path = prefix ? `${prefix}/${dirent.name}` : dirent.name;
    if (dirent.isSymbolicLink()) {
      entries.push({ path, kind: "link" });
    } else if (dirent.isDirectory()) {
      entries.push(...(await listEntries(root, path)));
    } else if (dirent.isFile()) {
      entries.push({ path, kind: "file" });
    }
  }
  return entries;
}

function sha256Hex(data: string | Buffer): string {
  return createHash("sha256").update(data).digest("hex");
}

/** Writes `bundle.sig` for a bundle directory. Used by publishers and the `sign` CLI command. */
export async function signBundle(bundleDir: string, privateKeyPem: string): Promise<string> {
  const digest = await computeBundleDigest(bundleDir);
  const signature = sign(null, digest, createPrivateKey(privateKeyPem)).toString("base64");
  await writeFile(join(bundleDir, SIGNATURE_FILE), signature + "\n", "utf-8");
  return signature;
}

export class Ed25519SignatureVerifier implements SignatureVerifierPort {
  private readonly keys: KeyObject[];

  /** @param trustedKeys PEM-encoded Ed25519 public keys */
  constructor(trustedKeys: readonly string[]) {
    this.keys = trustedKeys.map((pem, index) => {
      let key: KeyObject;
      try {
        key = createPublicKey(pem);
      } catch (err) {
        throw new ConfigError(describeError(err), `trustedKeys[${index}]`);
      }
      if (key.asymmetricKeyType !== "ed25519") {
        throw new ConfigError(`expected an ed25519 key, got ${key.asymmetricKeyType ?? "unknown"}`, `trustedKeys[${index}]`);
      }
      return key;
    });
  }

  async verify(bundleDir: string, options: { required: boolean; source: string }): Promise<SignatureStatus> {
    let encoded: string | undefined;
    try {
      encoded = (await readFile(join(bundleDir, SIGNATURE_FILE), "utf-8")).trim();
    } catch (err) {
      if (!isNotFound(err)) {
        throw new InstallError(options.source, "signature file is unreadable", { cause: err });
      }
    }

    if (encoded === undefined) {
      if (options.required) {
        throw new InstallError(options.source, "bundle is not signed");
      }
      return { status: "unsigned" };
    }

    const signature = Buffer.from(encoded, "base64");
    const digest = await computeBundleDigest(bundleDir);

    const keyIndex = this.keys.findIndex((key) => verifiesWith(key, digest, signature));
    if (keyIndex === -1) {
      throw new InstallError(options.source, "signature does not match any trusted key");
    }
    return { status: "verified", keyIndex };
  }
}

function verifiesWith(key: KeyObject, digest: Buffer, signature: Buffer): boolean {
  try {
    return verify(null, digest, key, signature);
  } catch {
    // malformed signature bytes
    return false;
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
