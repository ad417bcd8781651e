/**
 * OpenAI provider for Curricula
 * Also serves OpenAI-compatible endpoints through baseUrl
 */

import OpenAI, { APIError } from "openai";
import type { LLMProvider, ProviderConfig, Message, ChatOptions, ChatResponse } from "./types.js";
import { ProviderError } from "../utils/errors.js";
import { DEFAULT_OPENAI_MODEL } from "../config/schema.js";

/**
 * Models that don't support the temperature parameter
 */
const MODELS_WITHOUT_TEMPERATURE: string[] = ["o1", "o1-mini", "o1-preview", "o3-mini"];

/**
 * OpenAI provider implementation
 */
export class OpenAIProvider implements LLMProvider {
  readonly id = "openai";
  readonly name = "OpenAI";

  private client: OpenAI | null = null;
  private config: ProviderConfig = {};

  /**
   * Initialize the provider
   */
  async initialize(config: ProviderConfig): Promise<void> {
    this.config = config;

    const apiKey = config.apiKey ?? process.env["OPENAI_API_KEY"];
    if (!apiKey) {
      throw new ProviderError(`${this.name} API key not provided`, {
        provider: this.id,
      });
    }

    this.client = new OpenAI({
      apiKey,
      baseURL: config.baseUrl,
      maxRetries: 0,
    });
  }

  private supportsTemperature(model: string): boolean {
    return !MODELS_WITHOUT_TEMPERATURE.some((m) => model.toLowerCase() === m);
  }

  /**
   * Send a chat message
   */
  async chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    const client = this.ensureInitialized();

    try {
      const model = options?.model ?? this.config.model ?? DEFAULT_OPENAI_MODEL;

      const response = await client.chat.completions.create(
        {
          model,
          max_tokens: options?.maxTokens ?? this.config.maxTokens ?? 4096,
          messages: this.convertMessages(messages, options?.system),
          ...(this.supportsTemperature(model) && {
            temperature: options?.temperature ?? this.config.temperature ?? 0.7,
          }),
        },
        { signal: options?.signal },
      );

      const choice = response.choices[0];

      return {
        id: response.id,
        content: choice?.message?.content ?? "",
        stopReason: choice?.finish_reason === "length" ? "max_tokens" : "end_turn",
        usage: {
          inputTokens: response.usage?.prompt_tokens ?? 0,
          outputTokens: response.usage?.completion_tokens ?? 0,
        },
        model: response.model,
      };
    } catch (error) {
      throw this.handleError(error);
    }
  }

  /**
   * Convert messages to OpenAI format, with the system prompt first
   */
  private convertMessages(
    messages: Message[],
    system?: string,
  ): OpenAI.Chat.ChatCompletionMessageParam[] {
    const converted: OpenAI.Chat.ChatCompletionMessageParam[] = system
      ? [{ role: "system", content: system }]
      : [];
    for (const message of messages) {
      converted.push(
        message.role === "user"
          ? { role: "user", content: message.content }
          : { role: "assistant", content: message.content },
      );
    }
    return converted;
  }

  private ensureInitialized(): OpenAI {
    if (!this.client) {
      throw new ProviderError("Provider not initialized", {
        provider: this.id,
      });
    }
    return this.client;
  }

  /**
   * Handle API errors
   */
  private handleError(error: unknown): ProviderError {
    if (error instanceof ProviderError) {
      return error;
    }

    if (error instanceof APIError) {
      const status = error.status ?? 0;
      return new ProviderError(error.message, {
        provider: this.id,
        statusCode: error.status,
        retryable: status === 0 || status === 408 || status === 429 || status >= 500,
        cause: error,
      });
    }

    return new ProviderError(error instanceof Error ? error.message : String(error), {
      provider: this.id,
      retryable: true,
      cause: error,
    });
  }
}
