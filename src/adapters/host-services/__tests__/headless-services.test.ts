import { afterEach, describe, expect, it, vi } from "vitest";

import { recordingLogger } from "../../../testing/plugin-fixtures.js";
import { AiSdkCompletionAdapter, UnconfiguredAiCompletionAdapter } from "../ai-sdk-completion.adapter.js";
import { InMemoryClipboardAdapter } from "../in-memory-clipboard.adapter.js";
import { LoggerUiAdapter } from "../logger-ui.adapter.js";

vi.mock("ai", () => ({
  generateText: vi.fn().mockResolvedValue({ text: "Looks fine." }),
}));

import { generateText } from "ai";

describe("InMemoryClipboardAdapter", () => {
  it("starts from the initial text and keeps the last write", async () => {
    const clipboard = new InMemoryClipboardAdapter("seed");
    await expect(clipboard.read()).resolves.toBe("seed");
    await clipboard.write("next");
    await expect(clipboard.read()).resolves.toBe("next");
  });
});

describe("LoggerUiAdapter", () => {
  it("logs notifications at the matching level", async () => {
    const { logger, entries } = recordingLogger();
    const ui = new LoggerUiAdapter(logger);

    await ui.showNotification({ pluginId: "com.example.hello", message: "Saved", level: "success" });
    await ui.showNotification({ pluginId: "com.example.hello", message: "Disk full", level: "warning" });

    expect(entries.map(({ level, event, pluginId, data }) => ({ level, event, pluginId, data }))).toEqual([
      { level: "info", event: "ui:notification", pluginId: "com.example.hello", data: { message: "Saved", level: "success" } },
      { level: "warn", event: "ui:notification", pluginId: "com.example.hello", data: { message: "Disk full", level: "warning" } },
    ]);
    expect(ui.notifications()).toHaveLength(2);
  });

  it("keeps only the latest notifications", async () => {
    const { logger, entries } = recordingLogger();
    const ui = new LoggerUiAdapter(logger, undefined, 2);

    for (const message of ["one", "two", "three"]) {
      await ui.showNotification({ pluginId: "com.example.hello", message, level: "info" });
    }

    expect(ui.notifications().map((n) => n.message)).toEqual(["two", "three"]);
    expect(entries).toHaveLength(3);
  });

  it("treats input dialogs as dismissed without a resolver", async () => {
    const { logger } = recordingLogger();
    await expect(new LoggerUiAdapter(logger).showInputDialog("com.example.hello", "Name?")).resolves.toBeUndefined();
  });

  it("asks the resolver for input", async () => {
    const { logger } = recordingLogger();
    const ui = new LoggerUiAdapter(logger, async (pluginId, prompt) => `${pluginId}: ${prompt}`);
    await expect(ui.showInputDialog("com.example.hello", "Name?")).resolves.toBe("com.example.hello: Name?");
  });
});

describe("AiSdkCompletionAdapter", () => {
  afterEach(() => vi.clearAllMocks());

  it("returns the generated text", async () => {
    const adapter = new AiSdkCompletionAdapter({ model: "test-model", defaultSystem: "You review code." });

    await expect(adapter.complete({ prompt: "Review this" })).resolves.toBe("Looks fine.");
    expect(generateText).toHaveBeenCalledWith(
      expect.objectContaining({ model: "test-model", prompt: "Review this", system: "You review code." }),
    );
  });

  it("prefers the plugin's system prompt", async () => {
    const adapter = new AiSdkCompletionAdapter({ model: "test-model", defaultSystem: "You review code." });

    await adapter.complete({ prompt: "Summarize", system: "Be brief." });
    expect(generateText).toHaveBeenCalledWith(expect.objectContaining({ system: "Be brief." }));
  });

  it("fails clearly when no provider is configured", async () => {
    await expect(new UnconfiguredAiCompletionAdapter().complete()).rejects.toThrow(
      "No AI provider is configured for the plugin host",
    );
  });
});
