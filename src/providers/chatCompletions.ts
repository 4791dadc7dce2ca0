/**
 * OpenAI-compatible chat completion providers.
 *
 * Groq and DigitalOcean Gradient both expose `POST /chat/completions` with
 * the OpenAI request and response schema; they differ in base URL, default
 * model and how they word authorization failures.
 */

import { z } from "zod";
import { NetworkError, ParseError, ProviderError, describeError } from "../errors.js";
import type { ChatMessage } from "../prompt.js";
import type {
  CompletionProvider,
  CompletionSettings,
  ProviderId,
} from "./types.js";

export interface ChatCompletionsOptions {
  apiKey: string;
  model?: string;
  baseURL?: string;
  fetch?: typeof fetch;
}

export interface ChatCompletionsBody {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  max_tokens: number;
}

const ChatCompletionsResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      })
    )
    .min(1),
});

const ErrorBodySchema = z.object({
  error: z.object({ message: z.string().optional() }).passthrough(),
});

export function errorMessageOf(body: string): string {
  try {
    const parsed = ErrorBodySchema.safeParse(JSON.parse(body));
    return parsed.success ? parsed.data.error.message ?? "" : "";
  } catch {
    return "";
  }
}

export abstract class ChatCompletionsProvider implements CompletionProvider {
  abstract readonly id: ProviderId;
  readonly model: string;
  protected readonly apiKey: string;
  protected readonly baseURL: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: ChatCompletionsOptions, defaults: { baseURL: string; model: string }) {
    this.apiKey = options.apiKey;
    this.model = options.model || defaults.model;
    this.baseURL = (options.baseURL || defaults.baseURL).replace(/\/+$/, "");
    this.fetchImpl = options.fetch ?? fetch;
  }

  get endpoint(): string {
    return `${this.baseURL}/chat/completions`;
  }

  buildBody(messages: ChatMessage[], settings: CompletionSettings): ChatCompletionsBody {
    return {
      model: this.model,
      messages,
      temperature: settings.temperature,
      max_tokens: settings.maxTokens,
    };
  }

  parseContent(body: string): string {
    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (error) {
      throw new ParseError("Unexpected response format from API (not JSON).", describeError(error));
    }

    const parsed = ChatCompletionsResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new ParseError("Unexpected response format from API.", parsed.error.issues);
    }
    return parsed.data.choices[0].message.content ?? "";
  }

  /** Message shown for a non-success status; subclasses refine per provider. */
  protected describeStatus(status: number, body: string): string {
    if (status === 401) {
      return "Invalid API key. Run `sayso --setup` to reconfigure.";
    }
    if (status === 429) {
      return "Rate limited. Please wait a moment and try again.";
    }
    const detail = errorMessageOf(body);
    return detail ? `API returned HTTP ${status}: ${detail}` : `API returned HTTP ${status}.`;
  }

  async complete(messages: ChatMessage[], settings: CompletionSettings): Promise<string> {
    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(this.endpoint, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify(this.buildBody(messages, settings)),
        signal: settings.signal,
      });
      text = await response.text();
    } catch (error) {
      if (settings.signal.aborted) throw error;
      throw new NetworkError(
        "Cannot reach the API. Check your internet connection.",
        describeError(error)
      );
    }

    if (response.status !== 200) {
      throw new ProviderError(this.describeStatus(response.status, text), response.status, text);
    }
    return this.parseContent(text);
  }
}

export class GroqProvider extends ChatCompletionsProvider {
  readonly id = "groq";

  static readonly BASE_URL = "https://api.groq.com/openai/v1";
  static readonly DEFAULT_MODEL = "llama-3.3-70b-versatile";

  constructor(options: ChatCompletionsOptions) {
    super(options, { baseURL: GroqProvider.BASE_URL, model: GroqProvider.DEFAULT_MODEL });
  }
}

export class GradientProvider extends ChatCompletionsProvider {
  readonly id = "digitalocean_gradient";

  static readonly BASE_URL = "https://inference.do-ai.run/v1";
  static readonly DEFAULT_MODEL = "llama3.3-70b-instruct";

  constructor(options: ChatCompletionsOptions) {
    super(options, { baseURL: GradientProvider.BASE_URL, model: GradientProvider.DEFAULT_MODEL });
  }

  // a 401 here also covers models outside the account's subscription tier
  protected describeStatus(status: number, body: string): string {
    if (status === 401) {
      const detail = errorMessageOf(body).toLowerCase();
      if (detail.includes("model") && detail.includes("tier")) {
        return `Model '${this.model}' is not available on your subscription tier.`;
      }
    }
    return super.describeStatus(status, body);
  }
}
