/**
 * Anthropic Claude provider for Curricula
 */

import Anthropic, { APIError } from "@anthropic-ai/sdk";
import type { LLMProvider, ProviderConfig, Message, ChatOptions, ChatResponse } from "./types.js";
import { ProviderError } from "../utils/errors.js";
import { DEFAULT_ANTHROPIC_MODEL } from "../config/schema.js";

/**
 * Anthropic provider implementation
 */
export class AnthropicProvider implements LLMProvider {
  readonly id = "anthropic";
  readonly name = "Anthropic Claude";

  private client: Anthropic | null = null;
  private config: ProviderConfig = {};

  /**
   * Initialize the provider
   */
  async initialize(config: ProviderConfig): Promise<void> {
    this.config = config;

    const apiKey = config.apiKey ?? process.env["ANTHROPIC_API_KEY"];
    if (!apiKey) {
      throw new ProviderError("Anthropic API key not provided", {
        provider: this.id,
      });
    }

    this.client = new Anthropic({
      apiKey,
      baseURL: config.baseUrl,
      maxRetries: 0,
    });
  }

  /**
   * Send a chat message
   */
  async chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    const client = this.ensureInitialized();

    try {
      const response = await client.messages.create(
        {
          model: options?.model ?? this.config.model ?? DEFAULT_ANTHROPIC_MODEL,
          max_tokens: options?.maxTokens ?? this.config.maxTokens ?? 4096,
          temperature: options?.temperature ?? this.config.temperature ?? 0.7,
          system: options?.system,
          messages: messages.map((m) => ({ role: m.role, content: m.content })),
        },
        { signal: options?.signal },
      );

      return {
        id: response.id,
        content: this.extractTextContent(response.content),
        stopReason: this.mapStopReason(response.stop_reason),
        usage: {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
        },
        model: response.model,
      };
    } catch (error) {
      throw this.handleError(error);
    }
  }

  private ensureInitialized(): Anthropic {
    if (!this.client) {
      throw new ProviderError("Provider not initialized", {
        provider: this.id,
      });
    }
    return this.client;
  }

  /**
   * Extract text content from response
   */
  private extractTextContent(content: Anthropic.ContentBlock[]): string {
    return content
      .filter((block): block is Anthropic.TextBlock => block.type === "text")
      .map((block) => block.text)
      .join("");
  }

  private mapStopReason(reason: string | null): ChatResponse["stopReason"] {
    switch (reason) {
      case "max_tokens":
        return "max_tokens";
      case "stop_sequence":
        return "stop_sequence";
      default:
        return "end_turn";
    }
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
