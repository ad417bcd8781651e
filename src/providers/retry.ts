/**
 * Attempt planning and backoff for the generation gateway
 */

import { WorkflowError } from "../utils/errors.js";
import type { ProfileConfig, RetryConfig } from "../config/schema.js";
import type { BackendId } from "../types/workflow.js";

/**
 * Calculate delay with jitter: +/- jitterFactor * baseDelay, clamped to [0, maxDelay]
 */
export function calculateDelay(baseDelay: number, jitterFactor: number, maxDelay: number): number {
  const jitter = baseDelay * jitterFactor * (Math.random() * 2 - 1);
  const delay = baseDelay + jitter;
  return Math.min(Math.max(delay, 0), maxDelay);
}

/**
 * Backoff before the nth retry on the same backend (n starts at 1)
 */
export function backoffDelay(retry: RetryConfig, n: number): number {
  const base = Math.min(
    retry.initialDelayMs * Math.pow(retry.backoffMultiplier, n - 1),
    retry.maxDelayMs,
  );
  return calculateDelay(base, retry.jitterFactor, retry.maxDelayMs);
}

/**
 * Check if an error is retryable.
 *
 * Workflow errors carry their own verdict (a 401 `ProviderError` does not
 * recover); anything else a backend throws is treated as transient.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof WorkflowError) {
    return error.recoverable;
  }
  return true;
}

/**
 * Ordered backends to try for one generation.
 *
 * `primaryAttempts` on the primary, then `fallbackAttempts` on the fallback. When
 * the profile has no distinct fallback, those attempts stay on the primary.
 */
export function planAttempts(profile: ProfileConfig, retry: RetryConfig): BackendId[] {
  const secondary =
    profile.fallback && profile.fallback !== profile.primary ? profile.fallback : profile.primary;

  return [
    ...Array.from({ length: retry.primaryAttempts }, () => profile.primary),
    ...Array.from({ length: retry.fallbackAttempts }, () => secondary),
  ];
}
