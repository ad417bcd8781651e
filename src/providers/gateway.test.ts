/**
 * Tests for the generation gateway
 */

import { describe, it, expect, vi } from "vitest";
import { GenerationGateway } from "./gateway.js";
import { GatewayConfigSchema, type GatewayConfig } from "../config/schema.js";
import {
  CancelledError,
  ExhaustedRetriesError,
  ProviderError,
} from "../utils/errors.js";
import { ScriptedProvider, sequence, hanging } from "../../test/mocks/provider.js";

function makeConfig(overrides: Record<string, unknown> = {}): GatewayConfig {
  return GatewayConfigSchema.parse({
    retry: { initialDelayMs: 0, jitterFactor: 0 },
    ...overrides,
  });
}

const parseJson = (raw: string): { ok: boolean } => {
  const value: unknown = JSON.parse(raw);
  if (typeof value === "object" && value !== null && "ok" in value && value.ok === true) {
    return { ok: true };
  }
  throw new Error("missing ok");
};

const request = { system: "sys", prompt: "make it", label: "test/task" };

describe("GenerationGateway", () => {
  it("should return the parsed value from the primary backend", async () => {
    const anthropic = new ScriptedProvider("anthropic", sequence('{"ok": true}'));
    const openai = new ScriptedProvider("openai", sequence('{"ok": true}'));
    const gateway = new GenerationGateway({ config: makeConfig(), providers: { anthropic, openai } });

    const result = await gateway.generate(request, "reasoning", { parse: parseJson });

    expect(result.value).toEqual({ ok: true });
    expect(result.backend).toBe("anthropic");
    expect(result.attempt).toBe(1);
    expect(result.usedFallback).toBe(false);
    expect(openai.requests).toHaveLength(0);
    expect(anthropic.requests[0]?.system).toBe("sys");
    expect(anthropic.requests[0]?.prompt).toBe("make it");
  });

  it("should retry the primary once, then use the fallback", async () => {
    const transient = new ProviderError("overloaded", {
      provider: "anthropic",
      statusCode: 529,
      retryable: true,
    });
    const anthropic = new ScriptedProvider("anthropic", sequence(transient));
    const openai = new ScriptedProvider("openai", sequence('{"ok": true}'));
    const gateway = new GenerationGateway({ config: makeConfig(), providers: { anthropic, openai } });

    const result = await gateway.generate(request, "reasoning", { parse: parseJson });

    expect(anthropic.requests).toHaveLength(2);
    expect(openai.requests).toHaveLength(1);
    expect(result.backend).toBe("openai");
    expect(result.attempt).toBe(3);
    expect(result.usedFallback).toBe(true);
    expect(gateway.usage.snapshot().openai.fallbacks).toBe(1);
    expect(gateway.usage.snapshot().anthropic.failures).toBe(2);
  });

  it("should treat malformed output as a failed attempt", async () => {
    const anthropic = new ScriptedProvider("anthropic", sequence("not json", '{"ok": true}'));
    const gateway = new GenerationGateway({ config: makeConfig(), providers: { anthropic } });

    const result = await gateway.generate(request, "reasoning", { parse: parseJson });

    expect(result.attempt).toBe(2);
    expect(result.backend).toBe("anthropic");
  });

  it("should throw ExhaustedRetriesError after three failed attempts", async () => {
    const anthropic = new ScriptedProvider("anthropic", sequence('{"ok": false}'));
    const openai = new ScriptedProvider("openai", sequence(""));
    const gateway = new GenerationGateway({ config: makeConfig(), providers: { anthropic, openai } });

    try {
      await gateway.generate(request, "reasoning", { parse: parseJson });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ExhaustedRetriesError);
      if (error instanceof ExhaustedRetriesError) {
        expect(error.attempts.map((a) => `${a.backend}:${a.code}`)).toEqual([
          "anthropic:MALFORMED_OUTPUT",
          "anthropic:MALFORMED_OUTPUT",
          "openai:MALFORMED_OUTPUT",
        ]);
        expect(error.lastOutput).toBe("");
        expect(error.profile).toBe("reasoning");
      }
    }
  });

  it("should give all attempts to the primary when there is no fallback", async () => {
    const anthropic = new ScriptedProvider("anthropic", sequence("x", "y", '{"ok": true}'));
    const config = makeConfig({ profiles: { reasoning: { primary: "anthropic" } } });
    const gateway = new GenerationGateway({ config, providers: { anthropic } });

    const result = await gateway.generate(request, "reasoning", { parse: parseJson });

    expect(anthropic.requests).toHaveLength(3);
    expect(result.attempt).toBe(3);
    expect(result.usedFallback).toBe(false);
  });

  it("should skip remaining primary attempts after a non-retryable error", async () => {
    const unauthorized = new ProviderError("invalid x-api-key", {
      provider: "anthropic",
      statusCode: 401,
    });
    const anthropic = new ScriptedProvider("anthropic", sequence(unauthorized));
    const openai = new ScriptedProvider("openai", sequence('{"ok": true}'));
    const gateway = new GenerationGateway({ config: makeConfig(), providers: { anthropic, openai } });

    const result = await gateway.generate(request, "reasoning", { parse: parseJson });

    expect(anthropic.requests).toHaveLength(1);
    expect(result.backend).toBe("openai");
  });

  it("should route profiles to their configured primary", async () => {
    const anthropic = new ScriptedProvider("anthropic", sequence('{"ok": true}'));
    const openai = new ScriptedProvider("openai", sequence('{"ok": true}'));
    const config = makeConfig({
      profiles: { structured: { primary: "openai", fallback: "anthropic" } },
    });
    const gateway = new GenerationGateway({ config, providers: { anthropic, openai } });

    const result = await gateway.generate(request, "structured", { parse: parseJson });

    expect(result.backend).toBe("openai");
    expect(openai.requests[0]?.options?.temperature).toBe(0.7);
  });

  it("should pass the profile temperature and configured model", async () => {
    const anthropic = new ScriptedProvider("anthropic", sequence('{"ok": true}'));
    const gateway = new GenerationGateway({ config: makeConfig(), providers: { anthropic } });

    await gateway.generate(request, "creative", { parse: parseJson });

    expect(anthropic.requests[0]?.options?.temperature).toBe(0.9);
    expect(anthropic.requests[0]?.options?.model).toBe("claude-sonnet-4-20250514");
    expect(anthropic.requests[0]?.options?.maxTokens).toBe(4096);
  });

  it("should time out a hanging call and move on", async () => {
    const anthropic = new ScriptedProvider("anthropic", hanging());
    const openai = new ScriptedProvider("openai", sequence('{"ok": true}'));
    const config = makeConfig({ timeout: { baseMs: 20, perOutputTokenMs: 0 } });
    const gateway = new GenerationGateway({ config, providers: { anthropic, openai } });

    const result = await gateway.generate(request, "reasoning", { parse: parseJson });

    expect(result.backend).toBe("openai");
    expect(anthropic.requests).toHaveLength(2);
  });

  it("should abort the in-flight call and not retry on cancellation", async () => {
    const controller = new AbortController();
    const anthropic = new ScriptedProvider("anthropic", () => {
      setTimeout(() => controller.abort(), 5);
      return new Promise<never>(() => undefined);
    });
    const openai = new ScriptedProvider("openai", sequence('{"ok": true}'));
    const gateway = new GenerationGateway({ config: makeConfig(), providers: { anthropic, openai } });

    await expect(
      gateway.generate(request, "reasoning", { parse: parseJson, signal: controller.signal }),
    ).rejects.toBeInstanceOf(CancelledError);
    expect(anthropic.requests).toHaveLength(1);
    expect(anthropic.requests[0]?.options?.signal?.aborted).toBe(true);
    expect(openai.requests).toHaveLength(0);
  });

  it("should initialize providers lazily through the factory", async () => {
    const anthropic = new ScriptedProvider("anthropic", sequence('{"ok": true}'));
    const factory = vi.fn(async () => anthropic);
    const gateway = new GenerationGateway({ config: makeConfig(), factory });

    await gateway.generate(request, "reasoning", { parse: parseJson });
    await gateway.generate(request, "reasoning", { parse: parseJson });

    expect(factory).toHaveBeenCalledTimes(1);
    expect(factory).toHaveBeenCalledWith(
      "anthropic",
      expect.objectContaining({ model: "claude-sonnet-4-20250514" }),
    );
  });

  it("should fall back when the primary cannot be initialized", async () => {
    const openai = new ScriptedProvider("openai", sequence('{"ok": true}'));
    const factory = vi.fn(async (backend: string) => {
      if (backend === "anthropic") {
        throw new ProviderError("Anthropic API key not provided", { provider: "anthropic" });
      }
      return openai;
    });
    const gateway = new GenerationGateway({ config: makeConfig(), factory });

    const result = await gateway.generate(request, "reasoning", { parse: parseJson });

    expect(result.backend).toBe("openai");
    expect(factory).toHaveBeenCalledTimes(2);
  });

  it("should track tokens and cost per backend", async () => {
    const anthropic = new ScriptedProvider("anthropic", sequence('{"ok": true}'));
    const gateway = new GenerationGateway({ config: makeConfig(), providers: { anthropic } });

    await gateway.generate(request, "reasoning", { parse: parseJson });
    const usage = gateway.usage.snapshot();

    expect(usage.anthropic.calls).toBe(1);
    expect(usage.anthropic.inputTokens).toBe(100);
    expect(usage.anthropic.outputTokens).toBe(50);
    // claude-sonnet-4: 100 * 3/1M + 50 * 15/1M
    expect(usage.anthropic.costUsd).toBeCloseTo(0.00105, 8);
    expect(usage.totals.tokens).toBe(150);
  });
});
