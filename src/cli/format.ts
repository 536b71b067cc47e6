// =============================================================================
// CLI Format — ANSI color helpers (zero dependencies)
// =============================================================================

import type { Plugin } from "../ports/plugin.port.js";

const CODES = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
} as const;

export type ColorName = Exclude<keyof typeof CODES, "reset" | "bold">;

export function color(name: ColorName, text: string): string {
  if (!process.stdout.isTTY) return text;
  return `${CODES[name]}${text}${CODES.reset}`;
}

export function bold(text: string): string {
  if (!process.stdout.isTTY) return text;
  return `${CODES.bold}${text}${CODES.reset}`;
}

/** `Name v1.2.3 (id)` followed by the indented description */
export function formatPlugin(plugin: Pick<Plugin, "manifest">, suffix = ""): string {
  const { manifest } = plugin;
  const head = `${bold(manifest.name)} ${color("gray", `v${manifest.version}`)} (${manifest.id})${suffix}`;
  return manifest.description ? `${head}\n  ${color("dim", manifest.description)}` : head;
}

/** Renders a command result for the terminal */
export function formatResult(value: unknown): string {
  if (value === undefined) return color("dim", "(no result)");
  if (typeof value === "string") return value;
  return JSON.stringify(value, null, 2) ?? String(value);
}
