/**
 * Backend pricing and cost estimation
 *
 * Prices are in USD per million tokens
 */

import type { BackendId } from "../types/workflow.js";

/**
 * Model pricing info
 */
export interface ModelPricing {
  inputPerMillion: number;
  outputPerMillion: number;
}

/**
 * Pricing table for known models
 */
export const MODEL_PRICING: Record<string, ModelPricing> = {
  // Anthropic Claude models
  "claude-opus-4-20250514": { inputPerMillion: 15, outputPerMillion: 75 },
  "claude-sonnet-4-20250514": { inputPerMillion: 3, outputPerMillion: 15 },
  "claude-3-7-sonnet-20250219": { inputPerMillion: 3, outputPerMillion: 15 },
  "claude-3-5-sonnet-20241022": { inputPerMillion: 3, outputPerMillion: 15 },
  "claude-3-5-haiku-20241022": { inputPerMillion: 0.8, outputPerMillion: 4 },

  // OpenAI models
  "gpt-4o": { inputPerMillion: 2.5, outputPerMillion: 10 },
  "gpt-4o-mini": { inputPerMillion: 0.15, outputPerMillion: 0.6 },
  "gpt-4-turbo": { inputPerMillion: 10, outputPerMillion: 30 },
  o1: { inputPerMillion: 15, outputPerMillion: 60 },
  "o3-mini": { inputPerMillion: 1.1, outputPerMillion: 4.4 },
};

/**
 * Default pricing per backend (used when model not found)
 */
export const DEFAULT_PRICING: Record<BackendId, ModelPricing> = {
  anthropic: { inputPerMillion: 3, outputPerMillion: 15 },
  openai: { inputPerMillion: 2.5, outputPerMillion: 10 },
};

/**
 * Cost estimation result
 */
export interface CostEstimate {
  inputCost: number;
  outputCost: number;
  totalCost: number;
  inputTokens: number;
  outputTokens: number;
  model: string;
  currency: "USD";
}

/**
 * Estimate cost for a request
 */
export function estimateCost(
  model: string,
  inputTokens: number,
  outputTokens: number,
  backend?: BackendId,
): CostEstimate {
  const pricing =
    MODEL_PRICING[model] ?? (backend ? DEFAULT_PRICING[backend] : DEFAULT_PRICING.anthropic);

  const inputCost = (inputTokens / 1_000_000) * pricing.inputPerMillion;
  const outputCost = (outputTokens / 1_000_000) * pricing.outputPerMillion;

  return {
    inputCost,
    outputCost,
    totalCost: inputCost + outputCost,
    inputTokens,
    outputTokens,
    model,
    currency: "USD",
  };
}

/**
 * Format cost as string
 */
export function formatCost(cost: number): string {
  if (cost === 0) {
    return "$0.00";
  }
  if (cost < 0.0001) {
    return "<$0.0001";
  }
  if (cost < 0.01) {
    return `$${cost.toFixed(4)}`;
  }
  return `$${cost.toFixed(2)}`;
}
