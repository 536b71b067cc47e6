// =============================================================================
// PluginEventBus — Lifecycle notifications for UI-facing observers
// =============================================================================

import type { PluginState } from "../ports/plugin.port.js";

export interface PluginEventMap {
  "plugin:discovered": { pluginId: string; bundlePath: string };
  "plugin:skipped": { bundlePath: string; reason: string };
  "plugin:installed": { pluginId: string; version: string };
  "plugin:uninstalled": { pluginId: string };
  "plugin:state": { pluginId: string; from: PluginState; to: PluginState };
}

export type PluginEventType = keyof PluginEventMap;

export interface PluginEvent<K extends PluginEventType = PluginEventType> {
  type: K;
  timestamp: number;
  data: PluginEventMap[K];
}

export type PluginEventHandler<K extends PluginEventType = PluginEventType> = (event: PluginEvent<K>) => void;

type ListenerTable = { [K in PluginEventType]: Set<PluginEventHandler<K>> };

export interface PluginEventBusOptions {
  /** Maximum listeners allowed per event type (default: 100). */
  maxListenersPerEvent?: number;
  /** Called when a listener throws; listeners never break the emitter */
  onListenerError?: (error: unknown, event: PluginEvent) => void;
}

export class PluginEventBus {
  private readonly listeners: ListenerTable = {
    "plugin:discovered": new Set(),
    "plugin:skipped": new Set(),
    "plugin:installed": new Set(),
    "plugin:uninstalled": new Set(),
    "plugin:state": new Set(),
  };
  private readonly wildcard = new Set<PluginEventHandler>();
  private readonly maxListenersPerEvent: number;
  private readonly onListenerError?: (error: unknown, event: PluginEvent) => void;

  constructor(options?: PluginEventBusOptions) {
    this.maxListenersPerEvent = options?.maxListenersPerEvent ?? 100;
    this.onListenerError = options?.onListenerError;
  }

  /** Subscribe to one event type. Returns an unsubscribe function. */
  on<K extends PluginEventType>(eventType: K, handler: PluginEventHandler<K>): () => void {
    const set: Set<PluginEventHandler<K>> = this.listeners[eventType];
    if (set.size >= this.maxListenersPerEvent) {
      throw new Error(`PluginEventBus: max listeners (${this.maxListenersPerEvent}) reached for "${eventType}"`);
    }
    set.add(handler);
    return () => {
      set.delete(handler);
    };
  }

  /** Subscribe to every event type. Returns an unsubscribe function. */
  onAny(handler: PluginEventHandler): () => void {
    this.wildcard.add(handler);
    return () => {
      this.wildcard.delete(handler);
    };
  }

  emit<K extends PluginEventType>(type: K, data: PluginEventMap[K]): void {
    const event: PluginEvent<K> = { type, timestamp: Date.now(), data };
    const specific: Set<PluginEventHandler<K>> = this.listeners[type];
    for (const handler of specific) this.dispatch(() => handler(event), event);
    for (const handler of this.wildcard) this.dispatch(() => handler(event), event);
  }

  listenerCount(eventType: PluginEventType): number {
    return this.listeners[eventType].size + this.wildcard.size;
  }

  removeAllListeners(): void {
    for (const set of Object.values(this.listeners)) set.clear();
    this.wildcard.clear();
  }

  private dispatch(call: () => void, event: PluginEvent): void {
    try {
      call();
    } catch (error) {
      this.onListenerError?.(error, event);
    }
  }
}
