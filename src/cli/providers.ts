// =============================================================================
// CLI Providers — Model factory for the plugin `ai.complete` command
// =============================================================================

import type { LanguageModel } from "ai";

import { AI_PROVIDERS } from "../config.js";

export type ProviderName = (typeof AI_PROVIDERS)[number];

const DEFAULT_MODELS: Record<ProviderName, string> = {
  openai: "gpt-5.2",
  anthropic: "claude-sonnet-4-20250514",
};

// Environment variable holding each provider's API key
export const ENV_MAP: Record<ProviderName, string> = {
  openai: "OPENAI_API_KEY",
  anthropic: "ANTHROPIC_API_KEY",
};

export const SUPPORTED_PROVIDERS: readonly ProviderName[] = AI_PROVIDERS;

export function isValidProvider(name: string): name is ProviderName {
  return AI_PROVIDERS.some((provider) => provider === name);
}

export function getDefaultModel(provider: ProviderName): string {
  return DEFAULT_MODELS[provider];
}

export function resolveApiKey(provider: ProviderName, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const key = env[ENV_MAP[provider]];
  return key === "" ? undefined : key;
}

export async function createModel(provider: ProviderName, apiKey: string, modelId?: string): Promise<LanguageModel> {
  const model = modelId ?? DEFAULT_MODELS[provider];

  switch (provider) {
    case "openai": {
      const { createOpenAI } = await import("@ai-sdk/openai");
      return createOpenAI({ apiKey })(model);
    }
    case "anthropic": {
      const { createAnthropic } = await import("@ai-sdk/anthropic");
      return createAnthropic({ apiKey })(model);
    }
  }
}
