/**
 * Generation backend types for Curricula
 */

/**
 * Message role
 */
export type MessageRole = "user" | "assistant";

/**
 * Chat message
 */
export interface Message {
  role: MessageRole;
  content: string;
}

/**
 * Chat options
 */
export interface ChatOptions {
  model?: string;
  maxTokens?: number;
  temperature?: number;
  system?: string;
  /** Aborts the in-flight request */
  signal?: AbortSignal;
}

/**
 * Chat response
 */
export interface ChatResponse {
  id: string;
  content: string;
  stopReason: "end_turn" | "max_tokens" | "stop_sequence";
  usage: {
    inputTokens: number;
    outputTokens: number;
  };
  model: string;
}

/**
 * LLM Provider interface
 *
 * Providers make exactly one request per `chat` call. Retries, fallback and
 * timeouts belong to the gateway.
 */
export interface LLMProvider {
  /**
   * Provider identifier
   */
  id: string;

  /**
   * Provider display name
   */
  name: string;

  /**
   * Initialize the provider
   */
  initialize(config: ProviderConfig): Promise<void>;

  /**
   * Send a chat message
   */
  chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse>;
}

/**
 * Provider configuration
 */
export interface ProviderConfig {
  apiKey?: string;
  baseUrl?: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
}
