// =============================================================================
// AiSdkCompletionAdapter — Routes plugin completions through the host's model
// =============================================================================

import { generateText, type LanguageModel } from "ai";

import type { AiCompletionPort, AiCompletionRequest } from "../../ports/host-services.port.js";

export interface AiSdkCompletionOptions {
  model: LanguageModel;
  /** Prepended when the plugin supplies no system prompt */
  defaultSystem?: string;
  timeoutMs?: number;
}

export class AiSdkCompletionAdapter implements AiCompletionPort {
  private readonly options: AiSdkCompletionOptions;

  constructor(options: AiSdkCompletionOptions) {
    this.options = options;
  }

  async complete(request: AiCompletionRequest): Promise<string> {
    const result = await generateText({
      model: this.options.model,
      prompt: request.prompt,
      system: request.system ?? this.options.defaultSystem,
      abortSignal: AbortSignal.timeout(this.options.timeoutMs ?? 60_000),
    });
    return result.text;
  }
}

/** Used when no provider is configured: every completion fails with a clear message. */
export class UnconfiguredAiCompletionAdapter implements AiCompletionPort {
  async complete(): Promise<string> {
    throw new Error("No AI provider is configured for the plugin host");
  }
}
