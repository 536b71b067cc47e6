// =============================================================================
// Config — Plugin host settings from ~/.aicsrc and AICS_* variables
// =============================================================================

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";

import { HOST_API_VERSION } from "./domain/host-command.schema.js";
import { isSemver } from "./domain/version.js";
import { ConfigError, describeError } from "./errors.js";

export const CONFIG_FILE = ".aicsrc";

export const AI_PROVIDERS = ["openai", "anthropic"] as const;

const SemverSchema = z.string().refine(isSemver, "must be a semantic version (e.g. 1.2.3)");
const DurationSchema = z.number().int().positive();

export const PluginHostConfigSchema = z
  .object({
    pluginsDir: z.string().min(1).default(() => join(homedir(), ".aics", "plugins")),
    workspaceRoot: z.string().min(1).default(() => process.cwd()),
    hostVersion: SemverSchema.default("1.0.0"),
    apiVersion: SemverSchema.default(HOST_API_VERSION),
    environment: z.enum(["development", "production"]).default("development"),
    /** Defaults to true in production, false in development */
    requireSignature: z.boolean().optional(),
    /** Ed25519 public keys (PEM) whose signatures are accepted */
    trustedKeys: z.array(z.string()).default([]),
    activationTimeoutMs: DurationSchema.default(10_000),
    commandTimeoutMs: DurationSchema.default(30_000),
    installTimeoutMs: DurationSchema.default(120_000),
    scriptTimeoutMs: DurationSchema.default(1_000),
    registryUrl: z.string().url().optional(),
    /** Regex sources; matching terminal commands are refused */
    blockedCommands: z.array(z.string()).default([]),
    /** When set, plugin network requests may only reach these hosts */
    allowedHosts: z.array(z.string()).optional(),
    ai: z
      .object({
        provider: z.enum(AI_PROVIDERS),
        model: z.string().min(1).optional(),
      })
      .optional(),
    logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
  })
  .transform((config) => ({
    ...config,
    requireSignature: config.requireSignature ?? config.environment === "production",
  }));

export type PluginHostConfigInput = z.input<typeof PluginHostConfigSchema>;
export type PluginHostConfig = z.output<typeof PluginHostConfigSchema>;

/** Validates `input` and fills in defaults. Throws `ConfigError` on the first bad field. */
export function resolveConfig(input: unknown = {}): PluginHostConfig {
  const result = PluginHostConfigSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join(".") : undefined;
    throw new ConfigError(issue?.message ?? "invalid configuration", field);
  }
  for (const source of result.data.blockedCommands) {
    try {
      new RegExp(source);
    } catch (err) {
      throw new ConfigError(describeError(err), "blockedCommands");
    }
  }
  return result.data;
}

export function configPath(): string {
  return join(homedir(), CONFIG_FILE);
}

/** Environment variables that override the config file */
export const ENV_OVERRIDES = {
  AICS_PLUGINS_DIR: "pluginsDir",
  AICS_ENV: "environment",
  AICS_LOG_LEVEL: "logLevel",
  AICS_REGISTRY_URL: "registryUrl",
} as const;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): PluginHostConfig {
  const path = configPath();
  let fileConfig: Record<string, unknown> = {};

  if (existsSync(path)) {
    let data: unknown;
    try {
      data = JSON.parse(readFileSync(path, "utf-8"));
    } catch {
      throw new ConfigError(`~/${CONFIG_FILE} is not valid JSON`);
    }
    if (typeof data !== "object" || data === null || Array.isArray(data)) {
      throw new ConfigError(`~/${CONFIG_FILE} must contain a JSON object`);
    }
    fileConfig = { ...data };
  }

  const overrides: Record<string, string> = {};
  for (const [variable, field] of Object.entries(ENV_OVERRIDES)) {
    const value = env[variable];
    if (value !== undefined && value !== "") overrides[field] = value;
  }

  return resolveConfig({ ...fileConfig, ...overrides });
}
