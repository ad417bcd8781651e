/**
 * Provider registry for Curricula
 */

import type { LLMProvider, ProviderConfig } from "./types.js";
import { AnthropicProvider } from "./anthropic.js";
import { OpenAIProvider } from "./openai.js";
import { getApiKey, getBaseUrl } from "../config/env.js";
import type { BackendId } from "../types/workflow.js";

/**
 * Create and initialize a provider by backend id.
 * API key and base URL fall back to the environment.
 */
export async function createProvider(
  backend: BackendId,
  config: ProviderConfig = {},
): Promise<LLMProvider> {
  const mergedConfig: ProviderConfig = {
    apiKey: config.apiKey ?? getApiKey(backend),
    baseUrl: config.baseUrl ?? getBaseUrl(backend),
    model: config.model,
    maxTokens: config.maxTokens,
    temperature: config.temperature,
  };

  const provider: LLMProvider =
    backend === "anthropic" ? new AnthropicProvider() : new OpenAIProvider();

  await provider.initialize(mergedConfig);
  return provider;
}
