/**
 * Per-backend usage accounting, shared by every run that uses the same gateway.
 *
 * All mutation happens synchronously between awaits, so concurrent runs on the
 * event loop never interleave inside an update.
 */

import { estimateCost } from "./pricing.js";
import type { BackendId } from "../types/workflow.js";

export interface BackendUsage {
  calls: number;
  failures: number;
  /** Successful calls served by a profile's fallback backend */
  fallbacks: number;
  inputTokens: number;
  outputTokens: number;
  costUsd: number;
  totalLatencyMs: number;
}

export type UsageSnapshot = Record<BackendId, BackendUsage> & {
  totals: { calls: number; failures: number; tokens: number; costUsd: number };
};

function emptyUsage(): BackendUsage {
  return {
    calls: 0,
    failures: 0,
    fallbacks: 0,
    inputTokens: 0,
    outputTokens: 0,
    costUsd: 0,
    totalLatencyMs: 0,
  };
}

export class UsageTracker {
  private readonly usage: Record<BackendId, BackendUsage> = {
    anthropic: emptyUsage(),
    openai: emptyUsage(),
  };

  recordSuccess(
    backend: BackendId,
    details: {
      model: string;
      inputTokens: number;
      outputTokens: number;
      latencyMs: number;
      fallback: boolean;
    },
  ): void {
    const entry = this.usage[backend];
    entry.calls += 1;
    entry.inputTokens += details.inputTokens;
    entry.outputTokens += details.outputTokens;
    entry.totalLatencyMs += details.latencyMs;
    entry.costUsd += estimateCost(
      details.model,
      details.inputTokens,
      details.outputTokens,
      backend,
    ).totalCost;
    if (details.fallback) {
      entry.fallbacks += 1;
    }
  }

  recordFailure(backend: BackendId, latencyMs: number): void {
    const entry = this.usage[backend];
    entry.calls += 1;
    entry.failures += 1;
    entry.totalLatencyMs += latencyMs;
  }

  snapshot(): UsageSnapshot {
    const anthropic = { ...this.usage.anthropic };
    const openai = { ...this.usage.openai };
    return {
      anthropic,
      openai,
      totals: {
        calls: anthropic.calls + openai.calls,
        failures: anthropic.failures + openai.failures,
        tokens:
          anthropic.inputTokens + anthropic.outputTokens + openai.inputTokens + openai.outputTokens,
        costUsd: anthropic.costUsd + openai.costUsd,
      },
    };
  }
}
