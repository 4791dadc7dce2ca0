import { describe, it, expect } from "vitest";
import {
  GeminiProvider,
  GradientProvider,
  GroqProvider,
  createProvider,
  runPipeline,
} from "./index.js";

describe("public API", () => {
  it("creates the provider named in the config", () => {
    const fetchStub: typeof fetch = async () => new Response("{}");
    expect(createProvider({ provider: "groq", apiKey: "test-key", model: "" }, { fetch: fetchStub })).toBeInstanceOf(GroqProvider);
    expect(
      createProvider({ provider: "digitalocean_gradient", apiKey: "test-key", model: "alibaba-qwen3-32b" })
    ).toMatchObject({ id: "digitalocean_gradient", model: "alibaba-qwen3-32b" });
    expect(
      createProvider(
        { provider: "gemini", apiKey: "test-key", model: "gemini-2.5-pro" },
        { generateContent: async () => ({ text: "ls" }) }
      )
    ).toBeInstanceOf(GeminiProvider);
  });

  it("falls back to the provider's default model when none is set", () => {
    const provider = createProvider({ provider: "digitalocean_gradient", apiKey: "test-key", model: "" });
    expect(provider).toBeInstanceOf(GradientProvider);
    expect(provider.model).toBe("llama3.3-70b-instruct");
  });

  it("exports the pipeline", () => {
    expect(typeof runPipeline).toBe("function");
  });
});
