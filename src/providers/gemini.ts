import {
  ApiError,
  GoogleGenAI,
  type GenerateContentParameters,
} from "@google/genai";
import { NetworkError, ParseError, ProviderError, describeError } from "../errors.js";
import type { ChatMessage } from "../prompt.js";
import type { CompletionProvider, CompletionSettings } from "./types.js";

export type GenerateContent = (
  params: GenerateContentParameters
) => Promise<{ text?: string }>;

export interface GeminiOptions {
  apiKey: string;
  model?: string;
  generateContent?: GenerateContent;
}

export class GeminiProvider implements CompletionProvider {
  readonly id = "gemini";
  readonly model: string;
  private readonly generateContent: GenerateContent;

  static readonly DEFAULT_MODEL = "gemini-2.5-flash";

  constructor(options: GeminiOptions) {
    this.model = options.model || GeminiProvider.DEFAULT_MODEL;
    if (options.generateContent) {
      this.generateContent = options.generateContent;
    } else {
      const ai = new GoogleGenAI({ apiKey: options.apiKey });
      this.generateContent = (params) => ai.models.generateContent(params);
    }
  }

  buildParams(messages: ChatMessage[], settings: CompletionSettings): GenerateContentParameters {
    const system = messages
      .filter((message) => message.role === "system")
      .map((message) => message.content)
      .join("\n\n");
    const contents = messages
      .filter((message) => message.role === "user")
      .map((message) => ({ role: "user", parts: [{ text: message.content }] }));

    return {
      model: this.model,
      contents,
      config: {
        systemInstruction: { parts: [{ text: system }] },
        temperature: settings.temperature,
        maxOutputTokens: settings.maxTokens,
        abortSignal: settings.signal,
      },
    };
  }

  async complete(messages: ChatMessage[], settings: CompletionSettings): Promise<string> {
    let response: { text?: string };
    try {
      response = await this.generateContent(this.buildParams(messages, settings));
    } catch (error) {
      if (settings.signal.aborted) throw error;
      if (error instanceof ApiError) {
        throw new ProviderError(`Gemini API error: ${error.message}`, error.status, error.message);
      }
      throw new NetworkError(
        "Cannot reach the Gemini API. Check your internet connection.",
        describeError(error)
      );
    }

    if (typeof response.text !== "string") {
      throw new ParseError("Gemini response contained no text candidate.");
    }
    return response.text;
  }
}
