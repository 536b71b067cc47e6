// =============================================================================
// Tests: VmPluginLoaderAdapter
// =============================================================================

import { rm } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { LoadError, MissingPermissionError, PluginTimeoutError } from "../../../errors.js";
import type { JsonObject } from "../../../domain/host-command.schema.js";
import { HostApi } from "../../../plugins/host-api.js";
import { readBundle } from "../../../plugins/manifest-store.js";
import type { Plugin, PluginModule } from "../../../ports/plugin.port.js";
import {
  createTempDir,
  createTestServices,
  recordingLogger,
  writeBundle,
  type ManifestFixture,
} from "../../../testing/plugin-fixtures.js";
import { VmPluginLoaderAdapter } from "../vm-plugin-loader.adapter.js";

describe("VmPluginLoaderAdapter", () => {
  let root: string;
  const loader = new VmPluginLoaderAdapter();

  async function pluginWith(entry: string, manifest: Partial<ManifestFixture> = {}): Promise<Plugin> {
    return readBundle(await writeBundle(root, { entry, manifest }));
  }

  async function load(entry: string, manifest: Partial<ManifestFixture> = {}): Promise<PluginModule> {
    const { logger } = recordingLogger();
    return loader.load(await pluginWith(entry, manifest), { timeoutMs: 200, logger });
  }

  async function run(module: PluginModule, plugin: Plugin, command: string, args: JsonObject = {}): Promise<unknown> {
    const handler = module.commands.get(command);
    if (!handler) throw new Error(`no command ${command}`);
    const host = new HostApi(createTestServices(root)).forPlugin(plugin);
    return handler(args, host);
  }

  beforeEach(async () => {
    root = await createTempDir();
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  // -- exports --
  it("loads hooks, commands and ui from module.exports", async () => {
    const module = await load(
      `module.exports = {
  activate() {},
  deactivate() {},
  commands: { greet: (args) => "hello " + args.name },
  ui: { view: { title: "Docker", icon: "shippingbox" } },
};`,
      { capabilities: ["ui"] },
    );

    expect(typeof module.activate).toBe("function");
    expect(typeof module.deactivate).toBe("function");
    expect([...module.commands.keys()]).toEqual(["greet"]);
    expect(module.ui).toEqual({ view: { title: "Docker", icon: "shippingbox" } });
  });

  it("binds hooks to the exported object", async () => {
    const plugin = await pluginWith(`const api = {
  count: 0,
  activate() { this.count += 1; },
  commands: { count: () => api.count },
};
module.exports = api;`);
    const { logger } = recordingLogger();
    const module = await loader.load(plugin, { timeoutMs: 200, logger });

    await module.activate?.(
      { apiVersion: "1.0.0", appVersion: "1.0.0", environment: "development" },
      new HostApi(createTestServices(root)).forPlugin(plugin),
    );
    await expect(run(module, plugin, "count")).resolves.toBe(1);
  });

  // -- isolation --
  it("runs without node globals", async () => {
    const plugin = await pluginWith(`module.exports = {
  commands: {
    globals: () =>
      [typeof process, typeof require, typeof Buffer, typeof URL, typeof __aicsSend].join(","),
  },
};`);
    const { logger } = recordingLogger();
    const module = await loader.load(plugin, { timeoutMs: 200, logger });

    await expect(run(module, plugin, "globals")).resolves.toBe("undefined,undefined,undefined,undefined,undefined");
  });

  it("gives plugin code no function from the host realm", async () => {
    const plugin = await pluginWith(
      `const reach = (fn) => {
  try {
    const found = fn.constructor("return process")();
    return typeof found === "object" && found !== null && typeof found.pid === "number" ? "escaped" : "contained";
  } catch (err) {
    return "blocked";
  }
};
module.exports = {
  commands: {
    reach: (args, host) => [
      reach(console.log),
      reach(setTimeout),
      reach(queueMicrotask),
      reach(host.invoke),
      reach(host.workspace.readFile),
      reach(globalThis.constructor),
      reach(Object.getPrototypeOf(host).constructor),
    ],
  },
};`,
      { permissions: ["fileRead"] },
    );
    const { logger } = recordingLogger();
    const module = await loader.load(plugin, { timeoutMs: 200, logger });

    await expect(run(module, plugin, "reach")).resolves.toEqual([
      "blocked",
      "blocked",
      "blocked",
      "blocked",
      "blocked",
      "blocked",
      "blocked",
    ]);
  });

  it("disables code generation from strings", async () => {
    const plugin = await pluginWith(`module.exports = { commands: { run: () => eval("1 + 1") } };`);
    const { logger } = recordingLogger();
    const module = await loader.load(plugin, { timeoutMs: 200, logger });

    await expect(run(module, plugin, "run")).rejects.toThrow(/Code generation from strings disallowed/);
  });

  it("forwards console output to the logger", async () => {
    const plugin = await pluginWith(`console.warn("careful", { a: 1 });\nmodule.exports = {};`);
    const { logger, entries } = recordingLogger();
    await loader.load(plugin, { timeoutMs: 200, logger });

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: "warn",
      event: "plugin:console",
      pluginId: "com.example.hello",
      data: { message: 'careful {"a":1}' },
    });
  });

  it("runs plugin timers inside the context", async () => {
    const plugin = await pluginWith(`module.exports = {
  commands: {
    wait: (args) => new Promise((resolve) => {
      const ticks = [];
      const id = setInterval(() => ticks.push("tick"), 1);
      setTimeout(() => {
        clearInterval(id);
        resolve(ticks.length > 0 ? args.label : "no ticks");
      }, 20);
    }),
  },
};`);
    const { logger } = recordingLogger();
    const module = await loader.load(plugin, { timeoutMs: 200, logger });

    await expect(run(module, plugin, "wait", { label: "done" })).resolves.toBe("done");
  });

  it("passes arguments and results as JSON", async () => {
    const plugin = await pluginWith(`module.exports = {
  commands: {
    echo: (args) => ({ seen: args, when: new Date(0) }),
    fn: () => () => 1,
  },
};`);
    const { logger } = recordingLogger();
    const module = await loader.load(plugin, { timeoutMs: 200, logger });

    await expect(run(module, plugin, "echo", { tags: ["a"], n: 1 })).resolves.toEqual({
      seen: { tags: ["a"], n: 1 },
      when: "1970-01-01T00:00:00.000Z",
    });
    await expect(run(module, plugin, "fn")).resolves.toBeUndefined();
  });

  it("surfaces the host's error when plugin code rethrows it", async () => {
    const plugin = await pluginWith(`module.exports = {
  commands: {
    rethrow: async (args, host) => host.clipboard.read(),
    inspect: async (args, host) => {
      try {
        await host.clipboard.read();
        return "read";
      } catch (err) {
        return [err.name, err.code, err instanceof Error].join(",");
      }
    },
  },
};`);
    const { logger } = recordingLogger();
    const module = await loader.load(plugin, { timeoutMs: 200, logger });

    await expect(run(module, plugin, "rethrow")).rejects.toBeInstanceOf(MissingPermissionError);
    await expect(run(module, plugin, "inspect")).resolves.toBe("MissingPermissionError,MISSING_PERMISSION,true");
  });

  it("stops plugin timers on deactivate", async () => {
    const plugin = await pluginWith(`setInterval(() => console.log("tick"), 1);
module.exports = {};`);
    const { logger, entries } = recordingLogger();
    const module = await loader.load(plugin, { timeoutMs: 200, logger });

    await module.deactivate?.();
    const seen = entries.length;
    await new Promise((resolve) => setTimeout(resolve, 20));

    expect(entries).toHaveLength(seen);
  });

  // -- failures --
  it("stops a top-level infinite loop", async () => {
    const plugin = await pluginWith("while (true) {}");
    const { logger } = recordingLogger();

    const error = await loader.load(plugin, { timeoutMs: 50, logger }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(PluginTimeoutError);
    expect(error instanceof PluginTimeoutError && error.message).toBe(
      'Plugin "com.example.hello" entry point evaluation timed out after 50ms',
    );
  });

  it("halts a command that never yields and keeps the event loop running", async () => {
    const plugin = await pluginWith(`module.exports = {
  commands: {
    spin: () => { while (true) {} },
    greet: () => "hi",
  },
};`);
    const { logger, entries } = recordingLogger();
    const module = await loader.load(plugin, { timeoutMs: 50, logger });

    const error = await run(module, plugin, "spin").catch((err: unknown) => err);

    expect(error).toBeInstanceOf(PluginTimeoutError);
    expect(error instanceof PluginTimeoutError && error.message).toBe(
      'Plugin "com.example.hello" command "spin" timed out after 50ms',
    );
    expect(entries.map((entry) => entry.event)).toEqual(["plugin:halted"]);
    await expect(run(module, plugin, "greet")).rejects.toThrow(
      'Plugin "com.example.hello" failed to load: plugin code is no longer running',
    );
  });

  it("halts a loop that starts after an await", async () => {
    const plugin = await pluginWith(`module.exports = { commands: { later: async () => { await null; while (true) {} } } };`);
    const { logger } = recordingLogger();
    const module = await loader.load(plugin, { timeoutMs: 50, logger });

    await expect(run(module, plugin, "later")).rejects.toThrow(
      'Plugin "com.example.hello" command "later" timed out after 50ms',
    );
  });

  it("halts an activate hook that never yields", async () => {
    const plugin = await pluginWith(`module.exports = { activate() { for (;;) {} } };`);
    const { logger } = recordingLogger();
    const module = await loader.load(plugin, { timeoutMs: 50, logger });

    await expect(
      module.activate?.(
        { apiVersion: "1.0.0", appVersion: "1.0.0", environment: "development" },
        new HostApi(createTestServices(root)).forPlugin(plugin),
      ),
    ).rejects.toThrow('Plugin "com.example.hello" activation timed out after 50ms');
  });

  it("reports syntax errors as LoadError", async () => {
    const error = await load("module.exports = {").catch((err: unknown) => err);
    expect(error).toBeInstanceOf(LoadError);
    expect(error).not.toBeInstanceOf(PluginTimeoutError);
  });

  it("reports a missing entry file", async () => {
    const plugin = await pluginWith("module.exports = {};");
    await rm(join(plugin.bundlePath, "main.js"));
    const { logger } = recordingLogger();

    await expect(loader.load(plugin, { timeoutMs: 200, logger })).rejects.toThrow(
      'Plugin "com.example.hello" failed to load: cannot read entry point main.js',
    );
  });

  it.each([
    ["module.exports = 42;", "entry point must assign an object to module.exports"],
    ["module.exports = { activate: 1 };", "exported activate must be a function"],
    ["module.exports = { deactivate: 'no' };", "exported deactivate must be a function"],
    ["module.exports = { commands: 3 };", "exported commands must be an object of functions"],
    ["module.exports = { commands: { a: 1 } };", 'command "a" must be a function'],
  ])("rejects %s", async (entry, reason) => {
    await expect(load(entry)).rejects.toThrow(`Plugin "com.example.hello" failed to load: ${reason}`);
  });

  // -- ui capability --
  it("ignores ui exports without the ui capability", async () => {
    const plugin = await pluginWith(`module.exports = { ui: { view: { title: "Docker", icon: "shippingbox" } } };`);
    const { logger, entries } = recordingLogger();
    const module = await loader.load(plugin, { timeoutMs: 200, logger });

    expect(module.ui).toBeUndefined();
    expect(entries.map((entry) => entry.event)).toEqual(["load:ui-ignored"]);
  });

  it("rejects a malformed ui contribution", async () => {
    await expect(
      load(`module.exports = { ui: { menuItem: { title: "Run", icon: "play" } } };`, { capabilities: ["ui"] }),
    ).rejects.toThrow('Plugin "com.example.hello" failed to load: invalid ui contribution: Required');
  });
});
