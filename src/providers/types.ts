import type { ChatMessage } from "../prompt.js";

export const PROVIDER_IDS = ["groq", "digitalocean_gradient", "gemini"] as const;

export type ProviderId = (typeof PROVIDER_IDS)[number];

export interface ProviderConfig {
  provider: ProviderId;
  apiKey: string;
  model: string;
}

export interface CompletionSettings {
  temperature: number;
  maxTokens: number;
  signal: AbortSignal;
}

/**
 * One implementation per hosted API. Each one builds its own request and
 * parses its own response shape, and returns the raw assistant text.
 *
 * Implementations throw `ProviderError` for non-success statuses and
 * `ParseError` for unexpected bodies. When `settings.signal` fires they
 * let the abort reason propagate; the client decides what it means.
 */
export interface CompletionProvider {
  readonly id: ProviderId;
  readonly model: string;
  complete(messages: ChatMessage[], settings: CompletionSettings): Promise<string>;
}

export function isProviderId(value: string): value is ProviderId {
  return PROVIDER_IDS.some((id) => id === value);
}
