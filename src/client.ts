import {
  EmptyResponseError,
  InterruptedError,
  NetworkError,
} from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { ChatMessage } from "./prompt.js";
import type { CompletionProvider } from "./providers/types.js";

export interface CompletionResult {
  commandText: string;
}

export interface CompletionClientOptions {
  timeoutMs?: number;
  temperature?: number;
  maxTokens?: number;
  logger?: Logger;
}

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_TEMPERATURE = 0.1;
export const DEFAULT_MAX_TOKENS = 400;

// one backtick run around the whole reply, with none inside it
const INLINE_CODE = /^(`+)([^`]*)\1$/;

/**
 * Strips what models wrap around a command despite being told not to:
 * reasoning blocks, code fences with an optional language tag, and
 * inline-code backticks around the whole reply. Backticks that belong to
 * the command, such as command substitution, are kept.
 */
export function cleanCommand(text: string): string {
  const stripped = text
    .replace(/<think>[\s\S]*?<\/think>/g, "")
    .replace(/```[\w-]*\n?/g, "")
    .trim();
  const inline = INLINE_CODE.exec(stripped);
  return inline ? inline[2].trim() : stripped;
}

export class CompletionClient {
  private readonly timeoutMs: number;
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly logger: Logger;

  constructor(
    private readonly provider: CompletionProvider,
    options: CompletionClientOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.temperature = options.temperature ?? DEFAULT_TEMPERATURE;
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.logger = options.logger ?? silentLogger;
  }

  async complete(messages: ChatMessage[], signal?: AbortSignal): Promise<CompletionResult> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;

    this.logger.debug("Requesting completion", {
      provider: this.provider.id,
      model: this.provider.model,
      timeoutMs: this.timeoutMs,
    });

    let content: string;
    try {
      content = await this.provider.complete(messages, {
        temperature: this.temperature,
        maxTokens: this.maxTokens,
        signal: combined,
      });
    } catch (error) {
      if (signal?.aborted) throw new InterruptedError();
      if (timeout.aborted) {
        throw new NetworkError(
          `API request timed out after ${Math.round(this.timeoutMs / 1000)}s. Try again.`
        );
      }
      throw error;
    }

    const commandText = cleanCommand(content);
    this.logger.debug("Completion received", { raw: content, commandText });
    if (!commandText) {
      throw new EmptyResponseError();
    }
    return { commandText };
  }
}
