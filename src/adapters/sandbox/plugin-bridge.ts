// =============================================================================
// PluginBridge — Host half of the message channel into one plugin context
// =============================================================================

import { createContext, Script, type Context } from "node:vm";

import { describeError, LoadError, PluginTimeoutError } from "../../errors.js";
import { log, type Logger } from "../../logging.js";
import type { PluginHostApi } from "../../ports/host-api.port.js";
import {
  BRIDGE_SCRIPT,
  ENTER_GLOBAL,
  MODULE_GLOBAL,
  PluginMessageSchema,
  SEND_GLOBAL,
  type CallTarget,
  type ExportsDescriptor,
  type HostMessage,
  type PluginMessage,
} from "./bridge-script.js";

/** Longest delay Node timers accept */
const MAX_TIMER_MS = 2_147_483_647;

interface PendingCall {
  resolve: (value: unknown) => void;
  reject: (error: unknown) => void;
}

export interface PluginBridgeOptions {
  pluginId: string;
  /** Budget for each synchronous turn of plugin code, microtasks included */
  timeoutMs: number;
  logger: Logger;
}

/**
 * Owns one vm context. Host code never hands a host-realm object or function
 * to plugin code except the bootstrap's `send`; every turn of plugin code
 * runs through `runInContext` with a timeout, so a synchronous loop anywhere
 * halts the plugin instead of the event loop.
 */
export class PluginBridge {
  private readonly pluginId: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly context: Context;
  private state: "ready" | "halted" | "disposed" = "ready";
  private haltReason: unknown;
  private exports?: ExportsDescriptor;
  private moduleError?: string;
  private callSeq = 0;
  private readonly pending = new Map<number, PendingCall>();
  private readonly timers = new Map<number, NodeJS.Timeout>();
  private readonly handleIds = new Map<PluginHostApi, number>();
  private readonly handles = new Map<number, PluginHostApi>();
  /** Host errors delivered to plugin code, kept so a rethrow surfaces the original */
  private readonly hostErrors = new Map<number, unknown>();
  private hostErrorSeq = 0;

  constructor(options: PluginBridgeOptions) {
    this.pluginId = options.pluginId;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger;

    // A null prototype keeps host Object.prototype (and its constructor) off the global's lookup chain
    const sandbox: Record<string, unknown> = Object.create(null);
    sandbox[SEND_GLOBAL] = (raw: unknown) => this.receive(raw);
    this.context = createContext(sandbox, {
      name: `plugin:${options.pluginId}`,
      codeGeneration: { strings: false, wasm: false },
      microtaskMode: "afterEvaluate",
    });
    new Script(BRIDGE_SCRIPT, { filename: "plugin-bridge.js" }).runInContext(this.context);
    Reflect.deleteProperty(sandbox, SEND_GLOBAL);
  }

  /**
   * Evaluates a CommonJS-style entry file and describes what it exported.
   * Top-level errors become `LoadError`; a runaway top level a `PluginTimeoutError`.
   */
  evaluate(code: string, filename: string): ExportsDescriptor {
    const wrapped = `${MODULE_GLOBAL}(function (module, exports) {\n${code}\n});`;
    let script: Script;
    try {
      script = new Script(wrapped, { filename, lineOffset: -1 });
    } catch (err) {
      this.dispose();
      throw new LoadError(this.pluginId, describeError(err), { cause: err });
    }

    try {
      script.runInContext(this.context, { timeout: this.timeoutMs });
    } catch (err) {
      this.dispose();
      if (isScriptTimeout(err)) {
        throw new PluginTimeoutError(this.pluginId, "entry point evaluation", this.timeoutMs);
      }
      throw new LoadError(this.pluginId, describeError(err), { cause: err });
    }

    if (this.moduleError !== undefined) {
      this.dispose();
      throw new LoadError(this.pluginId, this.moduleError);
    }
    if (!this.exports) {
      this.dispose();
      throw new LoadError(this.pluginId, "entry point did not finish loading");
    }
    return this.exports;
  }

  /** Runs an exported hook or command; resolves with its JSON result. */
  call(label: string, target: CallTarget, args: unknown[], host?: PluginHostApi): Promise<unknown> {
    if (this.state !== "ready") return Promise.reject(this.stoppedError());

    const id = ++this.callSeq;
    const result = new Promise<unknown>((resolve, reject) => {
      this.pending.set(id, { resolve, reject });
    });
    this.enter(
      {
        op: "call",
        id,
        target,
        args: JSON.stringify(args),
        handle: host ? this.handleFor(host) : undefined,
        apiVersion: host?.apiVersion,
      },
      label,
    );
    return result;
  }

  /** Stops timers and forgets handles. Later calls reject. */
  dispose(): void {
    if (this.state === "disposed") return;
    this.state = "disposed";
    this.stop(this.stoppedError());
  }

  // ─── Private ────────────────────────────────────────────────────────────

  private enter(message: HostMessage, label: string): void {
    if (this.state !== "ready") return;
    const source = `${ENTER_GLOBAL}(${JSON.stringify(JSON.stringify(message))});`;
    try {
      new Script(source, { filename: "plugin-bridge.js" }).runInContext(this.context, { timeout: this.timeoutMs });
    } catch (err) {
      const reason = isScriptTimeout(err)
        ? new PluginTimeoutError(this.pluginId, label, this.timeoutMs)
        : new LoadError(this.pluginId, `plugin bridge failed: ${describeError(err)}`, { cause: err });
      log(this.logger, "error", "plugin:halted", { reason: reason.message }, this.pluginId);
      this.state = "halted";
      this.haltReason = reason;
      this.stop(reason);
    }
  }

  /** Called synchronously from plugin code; never throws back into the context. */
  private receive(raw: unknown): undefined {
    try {
      const parsed = typeof raw === "string" ? PluginMessageSchema.safeParse(JSON.parse(raw)) : undefined;
      if (!parsed?.success) {
        log(this.logger, "warn", "plugin:bad-message", undefined, this.pluginId);
        return undefined;
      }
      this.handle(parsed.data);
    } catch (err) {
      log(this.logger, "error", "plugin:bridge-error", { error: describeError(err) }, this.pluginId);
    }
    return undefined;
  }

  private handle(message: PluginMessage): void {
    switch (message.op) {
      case "module":
        this.exports = message.exports;
        return;
      case "module-error":
        this.moduleError = message.message;
        return;
      case "done":
        this.settle(message.id, (call) => call.resolve(message.value === undefined ? undefined : JSON.parse(message.value)));
        return;
      case "failed":
        this.settle(message.id, (call) => call.reject(this.toHostError(message)));
        return;
      case "invoke":
        this.invoke(message.handle, message.requestId, message.command);
        return;
      case "timer":
        this.schedule(message.id, message.ms, message.repeat);
        return;
      case "clearTimer":
        this.clearTimer(message.id);
        return;
      case "console":
        log(this.logger, message.level, "plugin:console", { message: message.message }, this.pluginId);
        return;
      case "uncaught":
        log(this.logger, "warn", "plugin:uncaught", { error: message.message }, this.pluginId);
        return;
      default: {
        const unhandled: never = message;
        log(this.logger, "warn", "plugin:bad-message", { message: unhandled }, this.pluginId);
      }
    }
  }

  private settle(id: number, fn: (call: PendingCall) => void): void {
    const call = this.pending.get(id);
    if (!call) return;
    this.pending.delete(id);
    fn(call);
    if (this.pending.size === 0) this.hostErrors.clear();
  }

  private toHostError(message: Extract<PluginMessage, { op: "failed" }>): unknown {
    if (message.errorId !== undefined && this.hostErrors.has(message.errorId)) {
      return this.hostErrors.get(message.errorId);
    }
    const error = new Error(message.message);
    error.name = message.name;
    return error;
  }

  private invoke(handleId: number, requestId: number, command: string): void {
    const host = this.handles.get(handleId);
    const label = "host API callback";
    Promise.resolve()
      .then(() => {
        if (!host) throw new LoadError(this.pluginId, `unknown host handle ${handleId}`);
        const payload: unknown = JSON.parse(command);
        return host.invoke(payload);
      })
      .then(
        (value) => this.enter({ op: "resolve", requestId, value: value === undefined ? undefined : JSON.stringify(value) }, label),
        (err: unknown) => {
          const errorId = ++this.hostErrorSeq;
          this.hostErrors.set(errorId, err);
          this.enter(
            {
              op: "reject",
              requestId,
              name: err instanceof Error ? err.name : "Error",
              message: describeError(err),
              code: errorCode(err),
              errorId,
            },
            label,
          );
        },
      )
      .catch((err: unknown) => {
        log(this.logger, "error", "plugin:bridge-error", { error: describeError(err) }, this.pluginId);
      });
  }

  private schedule(id: number, ms: number, repeat: boolean): void {
    const delay = Math.min(Math.max(ms, 0), MAX_TIMER_MS);
    const fire = (): void => {
      if (!repeat) this.timers.delete(id);
      this.enter({ op: "fire", id }, "timer callback");
    };
    const timer = repeat ? setInterval(fire, delay) : setTimeout(fire, delay);
    timer.unref();
    this.timers.set(id, timer);
  }

  private clearTimer(id: number): void {
    const timer = this.timers.get(id);
    if (timer) clearTimeout(timer);
    this.timers.delete(id);
  }

  private handleFor(host: PluginHostApi): number {
    const known = this.handleIds.get(host);
    if (known !== undefined) return known;
    const id = this.handleIds.size + 1;
    this.handleIds.set(host, id);
    this.handles.set(id, host);
    return id;
  }

  private stop(reason: unknown): void {
    for (const timer of this.timers.values()) clearTimeout(timer);
    this.timers.clear();
    const calls = [...this.pending.values()];
    this.pending.clear();
    for (const call of calls) call.reject(reason);
    this.hostErrors.clear();
    this.handleIds.clear();
    this.handles.clear();
  }

  private stoppedError(): LoadError {
    return new LoadError(this.pluginId, "plugin code is no longer running", { cause: this.haltReason });
  }
}

function isScriptTimeout(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ERR_SCRIPT_EXECUTION_TIMEOUT";
}

function errorCode(err: unknown): string | undefined {
  return typeof err === "object" && err !== null && "code" in err && typeof err.code === "string" ? err.code : undefined;
}
