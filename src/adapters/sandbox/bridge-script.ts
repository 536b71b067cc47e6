// =============================================================================
// Bridge Script — In-context half of the plugin bridge, plus its wire schema
// =============================================================================

import { z } from "zod";

/** Global the host sets before the bootstrap runs; the bootstrap deletes it */
export const SEND_GLOBAL = "__aicsSend";
/** Non-writable global the host calls (through `runInContext`) to deliver messages */
export const ENTER_GLOBAL = "__aicsEnter";
/** Non-writable global the wrapped entry file calls with its CommonJS factory */
export const MODULE_GLOBAL = "__aicsModule";

/**
 * Runs first in every plugin context. Everything plugin code can reach
 * (console, timers, the host API object, errors and promises) is built here
 * from the context's own intrinsics. The only host-realm value ever present
 * is the `send` function, held in a strict-mode closure and removed from the
 * global object before plugin code runs.
 *
 * Messages cross in both directions as JSON strings.
 */
export const BRIDGE_SCRIPT = `"use strict";
(() => {
  const send = globalThis.${SEND_GLOBAL};
  delete globalThis.${SEND_GLOBAL};

  const { stringify, parse } = JSON;
  const { apply } = Reflect;
  const { freeze, defineProperty, entries } = Object;
  const PromiseCtor = Promise;
  const ErrorCtor = Error;
  const MapCtor = Map;
  const WeakMapCtor = WeakMap;
  const StringCtor = String;
  const NumberCtor = Number;

  const post = (message) => {
    const payload = stringify(message);
    try {
      send(payload);
    } catch {
      throw new ErrorCtor("plugin bridge is unavailable");
    }
  };

  const describe = (value) => {
    if (typeof value === "object" && value !== null && typeof value.message === "string") return value.message;
    try {
      return StringCtor(value);
    } catch {
      return "unknown error";
    }
  };

  const format = (value) => {
    if (typeof value === "string") return value;
    try {
      const json = stringify(value);
      return json === undefined ? StringCtor(value) : json;
    } catch {
      return describe(value);
    }
  };

  const report = (error) => post({ op: "uncaught", message: describe(error) });

  // ─── console ───

  const forward = (level) => (...args) => {
    let message = "";
    for (let i = 0; i < args.length; i += 1) message += (i > 0 ? " " : "") + format(args[i]);
    post({ op: "console", level, message });
  };

  globalThis.console = freeze({
    log: forward("info"),
    info: forward("info"),
    debug: forward("debug"),
    warn: forward("warn"),
    error: forward("error"),
  });

  // ─── timers ───

  const timers = new MapCtor();
  let timerSeq = 0;

  const schedule = (repeat) => (fn, ms, ...args) => {
    if (typeof fn !== "function") throw new TypeError("callback must be a function");
    timerSeq += 1;
    timers.set(timerSeq, { fn, args, repeat });
    const delay = NumberCtor(ms);
    post({ op: "timer", id: timerSeq, ms: delay > 0 ? delay : 0, repeat });
    return timerSeq;
  };

  const cancel = (id) => {
    if (timers.delete(id)) post({ op: "clearTimer", id });
  };

  globalThis.setTimeout = schedule(false);
  globalThis.setInterval = schedule(true);
  globalThis.clearTimeout = cancel;
  globalThis.clearInterval = cancel;
  globalThis.queueMicrotask = (fn) => {
    PromiseCtor.resolve().then(fn).then(undefined, report);
  };

  // ─── host API ───

  const requests = new MapCtor();
  const hostErrors = new WeakMapCtor();
  let requestSeq = 0;

  const request = (handle, command) =>
    new PromiseCtor((resolve, reject) => {
      const payload = stringify(command);
      requestSeq += 1;
      requests.set(requestSeq, { resolve, reject });
      post({ op: "invoke", handle, requestId: requestSeq, command: payload });
    });

  const hosts = new MapCtor();

  const hostFor = (handle, apiVersion) => {
    const existing = hosts.get(handle);
    if (existing) return existing;
    const invoke = (command) => request(handle, command);
    const host = freeze({
      apiVersion,
      invoke,
      workspace: freeze({
        readFile: (path) => invoke({ type: "workspace.readFile", path }),
        writeFile: (path, content) => invoke({ type: "workspace.writeFile", path, content }),
        getPath: () => invoke({ type: "workspace.getPath" }),
      }),
      terminal: freeze({
        execute: (command, options) =>
          invoke({ type: "terminal.execute", command, cwd: options && options.cwd, timeoutMs: options && options.timeoutMs }),
      }),
      network: freeze({
        request: (url, init) =>
          invoke({
            type: "network.request",
            url,
            method: init && init.method,
            headers: init && init.headers,
            body: init && init.body,
          }),
      }),
      clipboard: freeze({
        read: () => invoke({ type: "clipboard.read" }),
        write: (text) => invoke({ type: "clipboard.write", text }),
      }),
      ui: freeze({
        showNotification: (message, level) => invoke({ type: "ui.showNotification", message, level }),
        showInputDialog: (prompt) => invoke({ type: "ui.showInputDialog", prompt }),
      }),
      ai: freeze({
        complete: (prompt, options) => invoke({ type: "ai.complete", prompt, system: options && options.system }),
      }),
      editor: freeze({
        getActiveEditor: () => invoke({ type: "editor.getActiveEditor" }),
        openFile: (path) => invoke({ type: "editor.openFile", path }),
        insertText: (text) => invoke({ type: "editor.insertText", text }),
      }),
    });
    hosts.set(handle, host);
    return host;
  };

  // ─── module ───

  let loaded = false;
  let exported;
  let commandsThis;
  const commands = new MapCtor();

  const typeOf = (value) => (value === null ? "null" : typeof value);

  defineProperty(globalThis, "${MODULE_GLOBAL}", {
    value: (factory) => {
      if (loaded) return;
      loaded = true;
      try {
        const module = { exports: {} };
        apply(factory, undefined, [module, module.exports]);
        exported = module.exports;

        if (typeof exported !== "object" || exported === null) {
          post({ op: "module", exports: { kind: typeOf(exported) } });
          return;
        }

        const rawCommands = exported.commands;
        let commandTypes;
        if (rawCommands !== undefined) {
          if (typeof rawCommands !== "object" || rawCommands === null) {
            commandTypes = null;
          } else {
            commandTypes = [];
            commandsThis = rawCommands;
            for (const [name, handler] of entries(rawCommands)) {
              commandTypes.push([name, typeof handler]);
              if (typeof handler === "function") commands.set(name, handler);
            }
          }
        }

        const rawUi = exported.ui;
        let ui;
        if (rawUi !== undefined) {
          try {
            ui = { json: stringify(rawUi) ?? null };
          } catch {
            ui = { json: null };
          }
        }

        post({
          op: "module",
          exports: {
            kind: "object",
            activate: typeof exported.activate,
            deactivate: typeof exported.deactivate,
            commands: commandTypes,
            ui,
          },
        });
      } catch (error) {
        post({ op: "module-error", message: describe(error) });
      }
    },
    writable: false,
    configurable: false,
    enumerable: false,
  });

  // ─── host → plugin ───

  const settle = (id, run) => {
    new PromiseCtor((resolve) => resolve(run())).then(
      (value) => {
        let json;
        try {
          json = value === undefined ? undefined : stringify(value);
        } catch (error) {
          post({ op: "failed", id, name: "TypeError", message: "result is not JSON: " + describe(error) });
          return;
        }
        post({ op: "done", id, value: json });
      },
      (error) => {
        const errorId = typeof error === "object" && error !== null ? hostErrors.get(error) : undefined;
        const name = typeof error === "object" && error !== null && typeof error.name === "string" ? error.name : "Error";
        post({ op: "failed", id, name, message: describe(error), errorId });
      },
    );
  };

  const handlers = {
    call(message) {
      const args = parse(message.args);
      const target = message.target;
      settle(message.id, () => {
        if (target.kind === "command") {
          const handler = commands.get(target.name);
          return apply(handler, commandsThis, [args[0], hostFor(message.handle, message.apiVersion)]);
        }
        if (target.kind === "activate") {
          return apply(exported.activate, exported, [freeze(args[0]), hostFor(message.handle, message.apiVersion)]);
        }
        return apply(exported.deactivate, exported, []);
      });
    },
    resolve(message) {
      const pending = requests.get(message.requestId);
      if (!pending) return;
      requests.delete(message.requestId);
      pending.resolve(message.value === undefined ? undefined : parse(message.value));
    },
    reject(message) {
      const pending = requests.get(message.requestId);
      if (!pending) return;
      requests.delete(message.requestId);
      const error = new ErrorCtor(message.message);
      error.name = message.name;
      if (message.code !== undefined) error.code = message.code;
      hostErrors.set(error, message.errorId);
      pending.reject(error);
    },
    fire(message) {
      const timer = timers.get(message.id);
      if (!timer) return;
      if (!timer.repeat) timers.delete(message.id);
      try {
        apply(timer.fn, undefined, timer.args);
      } catch (error) {
        report(error);
      }
    },
  };

  defineProperty(globalThis, "${ENTER_GLOBAL}", {
    value: (raw) => {
      try {
        const message = parse(raw);
        handlers[message.op](message);
      } catch (error) {
        report(error);
      }
    },
    writable: false,
    configurable: false,
    enumerable: false,
  });
})();
`;

// ─── plugin → host messages ─────────────────────────────────────────────────

const ExportsDescriptorSchema = z.object({
  kind: z.string(),
  activate: z.string().optional(),
  deactivate: z.string().optional(),
  /** `null` when `commands` is not an object; `[name, typeof handler]` pairs otherwise */
  commands: z.array(z.tuple([z.string(), z.string()])).nullable().optional(),
  /** `json` is `null` when the value could not be serialized */
  ui: z.object({ json: z.string().nullable() }).optional(),
});

export type ExportsDescriptor = z.infer<typeof ExportsDescriptorSchema>;

export const PluginMessageSchema = z.discriminatedUnion("op", [
  z.object({ op: z.literal("module"), exports: ExportsDescriptorSchema }),
  z.object({ op: z.literal("module-error"), message: z.string() }),
  z.object({ op: z.literal("done"), id: z.number().int(), value: z.string().optional() }),
  z.object({
    op: z.literal("failed"),
    id: z.number().int(),
    name: z.string(),
    message: z.string(),
    errorId: z.number().int().optional(),
  }),
  z.object({ op: z.literal("invoke"), handle: z.number().int(), requestId: z.number().int(), command: z.string() }),
  z.object({ op: z.literal("timer"), id: z.number().int(), ms: z.number(), repeat: z.boolean() }),
  z.object({ op: z.literal("clearTimer"), id: z.number().int() }),
  z.object({ op: z.literal("console"), level: z.enum(["debug", "info", "warn", "error"]), message: z.string() }),
  z.object({ op: z.literal("uncaught"), message: z.string() }),
]);

export type PluginMessage = z.infer<typeof PluginMessageSchema>;

// ─── host → plugin messages ─────────────────────────────────────────────────

export type CallTarget = { kind: "activate" } | { kind: "deactivate" } | { kind: "command"; name: string };

export type HostMessage =
  | { op: "call"; id: number; target: CallTarget; args: string; handle?: number; apiVersion?: string }
  | { op: "resolve"; requestId: number; value?: string }
  | { op: "reject"; requestId: number; name: string; message: string; code?: string; errorId: number }
  | { op: "fire"; id: number };
