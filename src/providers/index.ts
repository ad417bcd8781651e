/**
 * Provider exports for Curricula
 */

export type {
  LLMProvider,
  ProviderConfig,
  Message,
  MessageRole,
  ChatOptions,
  ChatResponse,
} from "./types.js";

export { AnthropicProvider } from "./anthropic.js";
export { OpenAIProvider } from "./openai.js";
export { isRetryableError, calculateDelay, backoffDelay, planAttempts } from "./retry.js";
export { MODEL_PRICING, DEFAULT_PRICING, estimateCost, formatCost } from "./pricing.js";
export type { ModelPricing, CostEstimate } from "./pricing.js";
export { UsageTracker } from "./usage.js";
export type { BackendUsage, UsageSnapshot } from "./usage.js";
export { GenerationGateway } from "./gateway.js";
export type {
  GatewayOptions,
  GenerationRequest,
  GenerationResult,
  GenerateOptions,
  ProviderFactory,
} from "./gateway.js";
export { createProvider } from "./factory.js";
