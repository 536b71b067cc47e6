// =============================================================================
// Tests — Host configuration (~/.aicsrc and AICS_* overrides)
// =============================================================================

import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

let tempDir: string;

// homedir() points at a fresh temp directory per test
vi.mock("node:os", async () => {
  const actual = await vi.importActual<typeof import("node:os")>("node:os");
  return {
    ...actual,
    homedir: () => tempDir,
  };
});

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe("config", () => {
  beforeEach(() => {
    tempDir = join(tmpdir(), `aics-config-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(tempDir, { recursive: true });
    vi.resetModules();
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  function writeRc(content: string): void {
    writeFileSync(join(tempDir, ".aicsrc"), content, "utf-8");
  }

  // ─── loadConfig ───

  it("uses defaults when there is no config file", async () => {
    const { loadConfig } = await import("../config.js");
    const config = loadConfig({});

    expect(config.pluginsDir).toBe(join(tempDir, ".aics", "plugins"));
    expect(config.workspaceRoot).toBe(process.cwd());
    expect(config.hostVersion).toBe("1.0.0");
    expect(config.apiVersion).toBe("1.0.0");
    expect(config.environment).toBe("development");
    expect(config.requireSignature).toBe(false);
    expect(config.trustedKeys).toEqual([]);
    expect(config.activationTimeoutMs).toBe(10_000);
    expect(config.commandTimeoutMs).toBe(30_000);
    expect(config.installTimeoutMs).toBe(120_000);
    expect(config.scriptTimeoutMs).toBe(1_000);
    expect(config.registryUrl).toBeUndefined();
    expect(config.logLevel).toBe("info");
  });

  it("reads ~/.aicsrc", async () => {
    writeRc(JSON.stringify({ hostVersion: "2.1.0", blockedCommands: ["\\bsudo\\b"], ai: { provider: "anthropic" } }));
    const { loadConfig } = await import("../config.js");
    const config = loadConfig({});

    expect(config.hostVersion).toBe("2.1.0");
    expect(config.blockedCommands).toEqual(["\\bsudo\\b"]);
    expect(config.ai).toEqual({ provider: "anthropic" });
  });

  it("requires signatures in production unless told otherwise", async () => {
    const { loadConfig, resolveConfig } = await import("../config.js");

    writeRc(JSON.stringify({ environment: "production" }));
    expect(loadConfig({}).requireSignature).toBe(true);
    expect(resolveConfig({ environment: "production", requireSignature: false }).requireSignature).toBe(false);
  });

  it("lets AICS_* variables override the file", async () => {
    writeRc(JSON.stringify({ pluginsDir: "/from/file", logLevel: "warn" }));
    const { loadConfig } = await import("../config.js");

    const config = loadConfig({
      AICS_PLUGINS_DIR: "/from/env",
      AICS_ENV: "production",
      AICS_LOG_LEVEL: "",
      AICS_REGISTRY_URL: "https://plugins.example.com/catalog.json",
    });

    expect(config.pluginsDir).toBe("/from/env");
    expect(config.environment).toBe("production");
    expect(config.logLevel).toBe("warn");
    expect(config.registryUrl).toBe("https://plugins.example.com/catalog.json");
  });

  it("rejects a file that is not JSON", async () => {
    writeRc("{ pluginsDir: ");
    const { loadConfig } = await import("../config.js");
    expect(() => loadConfig({})).toThrow("~/.aicsrc is not valid JSON");
  });

  it("rejects a file that is not an object", async () => {
    writeRc("[1, 2]");
    const { loadConfig } = await import("../config.js");
    expect(() => loadConfig({})).toThrow("~/.aicsrc must contain a JSON object");
  });

  // ─── resolveConfig ───

  it("names the field that failed validation", async () => {
    const { resolveConfig } = await import("../config.js");

    expect(() => resolveConfig({ activationTimeoutMs: -1 })).toThrow(
      'Invalid "activationTimeoutMs": Number must be greater than 0',
    );
    expect(thrownBy(() => resolveConfig({ registryUrl: "not a url" }))).toMatchObject({
      code: "CONFIG_ERROR",
      field: "registryUrl",
    });
    expect(thrownBy(() => resolveConfig({ ai: { provider: "someone-else" } }))).toMatchObject({
      field: "ai.provider",
    });
    expect(thrownBy(() => resolveConfig({ hostVersion: "latest" }))).toMatchObject({
      message: 'Invalid "hostVersion": must be a semantic version (e.g. 1.2.3)',
    });
  });

  it("rejects blocked command patterns that are not regular expressions", async () => {
    const { resolveConfig } = await import("../config.js");
    expect(thrownBy(() => resolveConfig({ blockedCommands: ["("] }))).toMatchObject({
      code: "CONFIG_ERROR",
      field: "blockedCommands",
    });
  });
});
