// =============================================================================
// CLI Providers — Language model factory (provider packages loaded on demand)
// =============================================================================

import type { LanguageModel } from "ai";

export const SUPPORTED_PROVIDERS = ["openai", "anthropic", "google"] as const;

export type ProviderName = (typeof SUPPORTED_PROVIDERS)[number];

const DEFAULT_MODELS: Record<ProviderName, string> = {
  openai: "gpt-4o-mini",
  anthropic: "claude-3-5-haiku-latest",
  google: "gemini-2.0-flash",
};

const API_KEY_ENV: Record<ProviderName, string> = {
  openai: "OPENAI_API_KEY",
  anthropic: "ANTHROPIC_API_KEY",
  google: "GOOGLE_GENERATIVE_AI_API_KEY",
};

export function isValidProvider(name: string): name is ProviderName {
  return SUPPORTED_PROVIDERS.some((p) => p === name);
}

export function getDefaultModel(provider: ProviderName): string {
  return DEFAULT_MODELS[provider];
}

export function envVarName(provider: ProviderName): string {
  return API_KEY_ENV[provider];
}

export function resolveApiKey(provider: ProviderName, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const key = env[API_KEY_ENV[provider]];
  return key && key.trim() !== "" ? key : undefined;
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
    case "google": {
      const { createGoogleGenerativeAI } = await import("@ai-sdk/google");
      return createGoogleGenerativeAI({ apiKey })(model);
    }
  }
}
