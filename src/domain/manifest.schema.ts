// =============================================================================
// Manifest Schema — Plugin identity, capabilities and permissions
// =============================================================================

import { posix, win32 } from "node:path";
import { z } from "zod";

import { ParseError } from "../errors.js";
import { isSemver } from "./version.js";

/** File name of the descriptor at the root of every bundle */
export const MANIFEST_FILE = "manifest.json";

/** Reserved extension of bundle directories and archives */
export const BUNDLE_EXTENSION = ".aicsplugin";

export const PluginCapabilitySchema = z.enum([
  "commands",
  "ui",
  "languageSupport",
  "theme",
  "snippets",
  "linter",
  "formatter",
  "debugger",
  "terminal",
  "fileSystem",
  "network",
  "ai",
]);

export type PluginCapability = z.infer<typeof PluginCapabilitySchema>;

export const PluginPermissionSchema = z.enum([
  "fileRead",
  "fileWrite",
  "network",
  "terminal",
  "process",
  "clipboard",
  "notifications",
]);

export type PluginPermission = z.infer<typeof PluginPermissionSchema>;

export const PLUGIN_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export const PluginIdSchema = z
  .string()
  .regex(PLUGIN_ID_PATTERN, "must start with a letter or digit and contain only letters, digits, '.', '_' or '-'");

const SemverSchema = z.string().refine(isSemver, "must be a semantic version (e.g. 1.2.3)");

/** True when `path` is relative and stays inside the directory it is resolved against. */
export function isContainedRelativePath(path: string): boolean {
  if (path.length === 0) return false;
  if (posix.isAbsolute(path) || win32.isAbsolute(path)) return false;
  const segments = path.replace(/\\/g, "/").split("/");
  return !segments.includes("..");
}

/** Arrays declared as sets: duplicates collapse to their first occurrence. */
function uniqueList<T extends z.ZodTypeAny>(item: T) {
  return z.array(item).transform((items): Array<z.output<T>> => [...new Set<z.output<T>>(items)]);
}

export const PluginManifestSchema = z
  .object({
    id: PluginIdSchema,
    name: z.string().min(1),
    version: SemverSchema,
    author: z.string(),
    description: z.string(),
    icon: z.string().optional(),
    homepage: z.string().url().optional(),
    capabilities: uniqueList(PluginCapabilitySchema),
    permissions: uniqueList(PluginPermissionSchema),
    dependencies: uniqueList(PluginIdSchema).optional(),
    entryPoint: z.string().refine(isContainedRelativePath, "must be a relative path inside the bundle"),
    minimumAppVersion: SemverSchema,
  })
  .superRefine((manifest, ctx) => {
    if (manifest.dependencies?.includes(manifest.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["dependencies"],
        message: "a plugin cannot depend on itself",
      });
    }
  })
  .readonly();

export type PluginManifest = z.infer<typeof PluginManifestSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}

/**
 * Parses a manifest descriptor. All or nothing: any malformed JSON, missing
 * field, or value outside the capability/permission enumerations throws.
 */
export function parseManifest(bytes: Uint8Array | string): PluginManifest {
  let text: string;
  try {
    text = typeof bytes === "string" ? bytes : new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (err) {
    throw new ParseError("Manifest is not valid UTF-8", [], { cause: err });
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new ParseError("Manifest is not valid JSON", [], { cause: err });
  }

  const result = PluginManifestSchema.safeParse(data);
  if (!result.success) {
    throw new ParseError("Invalid plugin manifest", formatIssues(result.error));
  }
  return result.data;
}

/** Stable JSON form. `parseManifest(serializeManifest(m))` deep-equals `m`. */
export function serializeManifest(manifest: PluginManifest): string {
  const ordered = {
    id: manifest.id,
    name: manifest.name,
    version: manifest.version,
    author: manifest.author,
    description: manifest.description,
    icon: manifest.icon,
    homepage: manifest.homepage,
    capabilities: manifest.capabilities,
    permissions: manifest.permissions,
    dependencies: manifest.dependencies,
    entryPoint: manifest.entryPoint,
    minimumAppVersion: manifest.minimumAppVersion,
  };
  return JSON.stringify(ordered, null, 2) + "\n";
}
