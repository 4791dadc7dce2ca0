import { ApiError } from "@google/genai";
import { describe, it, expect, vi } from "vitest";
import { NetworkError, ParseError, ProviderError } from "../errors.js";
import type { ChatMessage } from "../prompt.js";
import { GeminiProvider, type GenerateContent } from "./gemini.js";
import type { CompletionSettings } from "./types.js";

const messages: ChatMessage[] = [
  { role: "system", content: "Output one command." },
  { role: "system", content: "Shell: bash" },
  { role: "user", content: "list files" },
];

function settings(): CompletionSettings {
  return { temperature: 0.1, maxTokens: 400, signal: new AbortController().signal };
}

describe("GeminiProvider", () => {
  it("maps system messages to the system instruction", () => {
    const provider = new GeminiProvider({ apiKey: "test-key", generateContent: vi.fn<GenerateContent>() });
    const params = provider.buildParams(messages, settings());

    expect(params.model).toBe("gemini-2.5-flash");
    expect(params.contents).toEqual([{ role: "user", parts: [{ text: "list files" }] }]);
    expect(params.config?.systemInstruction).toEqual({
      parts: [{ text: "Output one command.\n\nShell: bash" }],
    });
    expect(params.config?.temperature).toBe(0.1);
    expect(params.config?.maxOutputTokens).toBe(400);
  });

  it("returns the response text", async () => {
    const generateContent = vi.fn<GenerateContent>(async () => ({ text: "ls -la" }));
    const provider = new GeminiProvider({ apiKey: "test-key", model: "gemini-2.5-pro", generateContent });

    await expect(provider.complete(messages, settings())).resolves.toBe("ls -la");
    expect(generateContent.mock.calls[0][0].model).toBe("gemini-2.5-pro");
  });

  it("fails with ParseError when there is no text", async () => {
    const provider = new GeminiProvider({
      apiKey: "test-key",
      generateContent: async () => ({}),
    });
    await expect(provider.complete(messages, settings())).rejects.toBeInstanceOf(ParseError);
  });

  it("maps API errors to ProviderError with the status", async () => {
    const provider = new GeminiProvider({
      apiKey: "test-key",
      generateContent: async () => {
        throw new ApiError({ message: "quota exceeded", status: 429 });
      },
    });
    const error = await provider.complete(messages, settings()).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({ status: 429 });
  });

  it("maps other failures to NetworkError", async () => {
    const provider = new GeminiProvider({
      apiKey: "test-key",
      generateContent: async () => {
        throw new TypeError("fetch failed");
      },
    });
    await expect(provider.complete(messages, settings())).rejects.toBeInstanceOf(NetworkError);
  });
});
