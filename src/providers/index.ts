import { GradientProvider, GroqProvider } from "./chatCompletions.js";
import { GeminiProvider, type GenerateContent } from "./gemini.js";
import type { CompletionProvider, ProviderConfig, ProviderId } from "./types.js";

export * from "./types.js";
export { ChatCompletionsProvider, GradientProvider, GroqProvider } from "./chatCompletions.js";
export { GeminiProvider } from "./gemini.js";

export interface ProviderOverrides {
  fetch?: typeof fetch;
  generateContent?: GenerateContent;
}

export const DEFAULT_MODELS: Record<ProviderId, string> = {
  groq: GroqProvider.DEFAULT_MODEL,
  digitalocean_gradient: GradientProvider.DEFAULT_MODEL,
  gemini: GeminiProvider.DEFAULT_MODEL,
};

export const PROVIDER_LABELS: Record<ProviderId, string> = {
  groq: "Groq",
  digitalocean_gradient: "DigitalOcean Gradient",
  gemini: "Google Gemini",
};

export function createProvider(
  config: ProviderConfig,
  overrides: ProviderOverrides = {}
): CompletionProvider {
  const { apiKey, model } = config;
  switch (config.provider) {
    case "groq":
      return new GroqProvider({ apiKey, model, fetch: overrides.fetch });
    case "digitalocean_gradient":
      return new GradientProvider({ apiKey, model, fetch: overrides.fetch });
    case "gemini":
      return new GeminiProvider({ apiKey, model, generateContent: overrides.generateContent });
  }
}
