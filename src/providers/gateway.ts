/**
 * Generation backend gateway
 *
 * One entry point for every role. A call names a profile; the profile names a
 * primary and optional fallback backend. The gateway walks the attempt plan,
 * enforces a per-call timeout, parses the output and records usage.
 */

import type { Logger, ILogObj } from "tslog";
import type { ChatResponse, LLMProvider, ProviderConfig } from "./types.js";
import type { GatewayConfig } from "../config/schema.js";
import type { BackendId, ProfileName } from "../types/workflow.js";
import { createProvider } from "./factory.js";
import { backoffDelay, isRetryableError, planAttempts } from "./retry.js";
import { UsageTracker } from "./usage.js";
import {
  CancelledError,
  ExhaustedRetriesError,
  MalformedOutputError,
  TimeoutError,
  WorkflowError,
  type AttemptRecord,
} from "../utils/errors.js";
import { sleep, throwIfAborted } from "../utils/async.js";
import { createChildLogger, getLogger } from "../utils/logger.js";

/**
 * One generation request, independent of backend
 */
export interface GenerationRequest {
  system: string;
  prompt: string;
  maxTokens?: number;
  temperature?: number;
  /** Shown in logs, e.g. "content_designer/create_content" */
  label?: string;
}

export interface GenerateOptions<T> {
  /**
   * Turn raw text into the typed value. Throwing marks the attempt as malformed
   * output, which is retried like any transient failure.
   */
  parse: (raw: string) => T;
  signal?: AbortSignal;
}

export interface GenerationResult<T> {
  value: T;
  raw: string;
  backend: BackendId;
  model: string;
  /** 1-based number of the attempt that succeeded */
  attempt: number;
  usedFallback: boolean;
  usage: { inputTokens: number; outputTokens: number };
  durationMs: number;
}

export type ProviderFactory = (backend: BackendId, config: ProviderConfig) => Promise<LLMProvider>;

export interface GatewayOptions {
  config: GatewayConfig;
  /** Pre-built providers; take precedence over the factory */
  providers?: Partial<Record<BackendId, LLMProvider>>;
  factory?: ProviderFactory;
  usage?: UsageTracker;
  logger?: Logger<ILogObj>;
}

export class GenerationGateway {
  readonly usage: UsageTracker;

  private readonly config: GatewayConfig;
  private readonly factory: ProviderFactory;
  private readonly providers = new Map<BackendId, Promise<LLMProvider>>();
  private readonly logger: Logger<ILogObj>;

  constructor(options: GatewayOptions) {
    this.config = options.config;
    this.factory = options.factory ?? createProvider;
    this.usage = options.usage ?? new UsageTracker();
    this.logger = options.logger ?? createChildLogger(getLogger(), "gateway");

    for (const [backend, provider] of Object.entries(options.providers ?? {})) {
      if (provider && (backend === "anthropic" || backend === "openai")) {
        this.providers.set(backend, Promise.resolve(provider));
      }
    }
  }

  /**
   * Generate and parse one artifact.
   *
   * @throws CancelledError when the signal aborts
   * @throws ExhaustedRetriesError when every planned attempt failed
   */
  async generate<T>(
    request: GenerationRequest,
    profileName: ProfileName,
    options: GenerateOptions<T>,
  ): Promise<GenerationResult<T>> {
    const profile = this.config.profiles[profileName];
    const plan = planAttempts(profile, this.config.retry);
    const failures: AttemptRecord[] = [];
    const skipped = new Set<BackendId>();
    let lastOutput: string | undefined;
    let lastError: unknown;
    let retriesOnBackend = 0;
    let previous: BackendId | undefined;

    for (const [index, backend] of plan.entries()) {
      if (skipped.has(backend)) continue;
      throwIfAborted(options.signal);

      if (backend === previous) {
        retriesOnBackend += 1;
        await sleep(backoffDelay(this.config.retry, retriesOnBackend), options.signal);
      } else {
        retriesOnBackend = 0;
        if (previous !== undefined) {
          this.logger.info(`Falling back from ${previous} to ${backend} for ${profileName}`);
        }
      }
      previous = backend;

      const backendConfig = this.config.backends[backend];
      const usedFallback = backend !== profile.primary;
      const maxTokens = request.maxTokens ?? backendConfig.maxTokens;
      const started = performance.now();

      try {
        const provider = await this.getProvider(backend);
        const response = await this.callWithTimeout(
          provider,
          request,
          {
            model: backendConfig.model,
            maxTokens,
            temperature: request.temperature ?? profile.temperature ?? backendConfig.temperature,
          },
          options.signal,
        );
        const durationMs = performance.now() - started;
        lastOutput = response.content;

        const value = this.parseOutput(backend, response.content, options.parse);

        this.usage.recordSuccess(backend, {
          model: response.model,
          inputTokens: response.usage.inputTokens,
          outputTokens: response.usage.outputTokens,
          latencyMs: durationMs,
          fallback: usedFallback,
        });

        return {
          value,
          raw: response.content,
          backend,
          model: response.model,
          attempt: index + 1,
          usedFallback,
          usage: response.usage,
          durationMs,
        };
      } catch (error) {
        if (error instanceof CancelledError) {
          throw error;
        }

        const durationMs = performance.now() - started;
        this.usage.recordFailure(backend, durationMs);
        lastError = error;
        failures.push({
          attempt: index + 1,
          backend,
          model: backendConfig.model,
          error: error instanceof Error ? error.message : String(error),
          code: error instanceof WorkflowError ? error.code : "UNKNOWN",
          durationMs,
        });

        this.logger.warn(
          `Attempt ${index + 1}/${plan.length} on ${backend} failed` +
            (request.label ? ` (${request.label})` : "") +
            `: ${error instanceof Error ? error.message : String(error)}`,
        );

        if (!isRetryableError(error)) {
          skipped.add(backend);
        }
      }
    }

    throw new ExhaustedRetriesError(
      `All ${failures.length} generation attempt(s) failed for profile '${profileName}'`,
      {
        profile: profileName,
        attempts: failures,
        lastOutput,
        cause: lastError,
      },
    );
  }

  /**
   * Get (and lazily initialize) the provider for a backend
   */
  private getProvider(backend: BackendId): Promise<LLMProvider> {
    const cached = this.providers.get(backend);
    if (cached) return cached;

    const backendConfig = this.config.backends[backend];
    const pending = this.factory(backend, {
      apiKey: backendConfig.apiKey,
      baseUrl: backendConfig.baseUrl,
      model: backendConfig.model,
      maxTokens: backendConfig.maxTokens,
      temperature: backendConfig.temperature,
    });
    this.providers.set(backend, pending);
    // A failed initialization (e.g. missing key) is retried on the next call
    void pending.catch(() => this.providers.delete(backend));
    return pending;
  }

  /**
   * One provider call bounded by the per-call timeout and the caller's signal.
   * The provider gets an AbortSignal; the race makes sure a provider that ignores
   * it cannot hold the workflow past the deadline.
   */
  private async callWithTimeout(
    provider: LLMProvider,
    request: GenerationRequest,
    settings: { model: string; maxTokens: number; temperature: number },
    signal: AbortSignal | undefined,
  ): Promise<ChatResponse> {
    throwIfAborted(signal);
    const { baseMs, perOutputTokenMs } = this.config.timeout;
    const timeoutMs = baseMs + perOutputTokenMs * settings.maxTokens;
    const controller = new AbortController();
    let timedOut = false;

    const onAbort = (): void => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);

    const aborted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener(
        "abort",
        () =>
          reject(
            timedOut
              ? new TimeoutError(`Generation call timed out after ${timeoutMs}ms`, {
                  timeoutMs,
                  operation: request.label ?? "generate",
                })
              : new CancelledError(),
          ),
        { once: true },
      );
    });

    try {
      return await Promise.race([
        provider.chat([{ role: "user", content: request.prompt }], {
          system: request.system,
          model: settings.model,
          maxTokens: settings.maxTokens,
          temperature: settings.temperature,
          signal: controller.signal,
        }),
        aborted,
      ]);
    } catch (error) {
      // The SDK's own abort error is replaced by the reason we aborted
      if (controller.signal.aborted) {
        if (signal?.aborted) throw new CancelledError();
        if (timedOut) {
          throw new TimeoutError(`Generation call timed out after ${timeoutMs}ms`, {
            timeoutMs,
            operation: request.label ?? "generate",
          });
        }
      }
      throw error;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  }

  private parseOutput<T>(backend: BackendId, raw: string, parse: (raw: string) => T): T {
    if (raw.trim() === "") {
      throw new MalformedOutputError("Backend returned empty output", {
        provider: backend,
        rawOutput: raw,
      });
    }
    try {
      return parse(raw);
    } catch (error) {
      throw new MalformedOutputError(
        `Backend output could not be parsed: ${error instanceof Error ? error.message : String(error)}`,
        { provider: backend, rawOutput: raw, cause: error },
      );
    }
  }
}
