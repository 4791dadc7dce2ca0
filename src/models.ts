import type { ProviderId } from "./providers/types.js";

export interface ModelEntry {
  id: string;
  name: string;
  description: string;
}

// ordered lightest to heaviest
export const MODEL_CATALOG: Record<ProviderId, ModelEntry[]> = {
  digitalocean_gradient: [
    { id: "llama3-8b-instruct", name: "Llama 3 8B", description: "fastest, lightweight" },
    { id: "mistral-nemo-instruct-2407", name: "Mistral Nemo", description: "fast, efficient" },
    { id: "alibaba-qwen3-32b", name: "Qwen 3 32B", description: "good balance" },
    { id: "llama3.3-70b-instruct", name: "Llama 3.3 70B", description: "powerful, open-source" },
    { id: "deepseek-r1-distill-llama-70b", name: "DeepSeek R1 70B", description: "reasoning focused" },
    { id: "openai-gpt-4o-mini", name: "GPT-4o Mini", description: "fast, premium" },
    { id: "openai-gpt-4o", name: "GPT-4o", description: "powerful, premium" },
  ],
  groq: [
    { id: "llama-3.1-8b-instant", name: "Llama 3.1 8B Instant", description: "fastest, lightweight" },
    { id: "openai/gpt-oss-20b", name: "GPT-OSS 20B", description: "fast, efficient" },
    { id: "qwen/qwen3-32b", name: "Qwen 3 32B", description: "good balance" },
    { id: "llama-3.3-70b-versatile", name: "Llama 3.3 70B Versatile", description: "powerful, open-source" },
    { id: "openai/gpt-oss-120b", name: "GPT-OSS 120B", description: "top-tier" },
  ],
  gemini: [
    { id: "gemini-2.5-flash-lite", name: "Gemini 2.5 Flash-Lite", description: "fastest, lightweight" },
    { id: "gemini-2.5-flash", name: "Gemini 2.5 Flash", description: "good balance" },
    { id: "gemini-2.5-pro", name: "Gemini 2.5 Pro", description: "top-tier" },
  ],
};
