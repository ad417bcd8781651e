/**
 * Tests for OpenAI provider
 */

import { describe, it, expect, vi, beforeEach } from "vitest";

const mockCreate = vi.fn();

class MockAPIError extends Error {
  status: number | undefined;
  constructor(status: number | undefined, message: string) {
    super(message);
    this.name = "APIError";
    this.status = status;
  }
}

vi.mock("openai", () => ({
  default: vi.fn().mockImplementation(() => ({
    chat: { completions: { create: mockCreate } },
  })),
  APIError: MockAPIError,
}));

describe("OpenAIProvider", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mockCreate.mockResolvedValue({
      id: "chatcmpl-1",
      choices: [{ message: { content: "Hi there" }, finish_reason: "length" }],
      usage: { prompt_tokens: 7, completion_tokens: 3 },
      model: "gpt-4o",
    });
  });

  it("should put the system prompt first", async () => {
    const { OpenAIProvider } = await import("./openai.js");
    const provider = new OpenAIProvider();
    await provider.initialize({ apiKey: "test-secret" });

    const response = await provider.chat([{ role: "user", content: "Hello" }], {
      system: "Be brief",
      temperature: 0.3,
    });

    expect(response.content).toBe("Hi there");
    expect(response.stopReason).toBe("max_tokens");
    expect(response.usage).toEqual({ inputTokens: 7, outputTokens: 3 });
    expect(mockCreate).toHaveBeenCalledWith(
      expect.objectContaining({
        model: "gpt-4o",
        temperature: 0.3,
        messages: [
          { role: "system", content: "Be brief" },
          { role: "user", content: "Hello" },
        ],
      }),
      { signal: undefined },
    );
  });

  it("should omit temperature for reasoning models", async () => {
    const { OpenAIProvider } = await import("./openai.js");
    const provider = new OpenAIProvider();
    await provider.initialize({ apiKey: "test-secret", model: "o3-mini" });

    await provider.chat([{ role: "user", content: "Hello" }]);

    const body: unknown = mockCreate.mock.calls[0]?.[0];
    expect(body).not.toHaveProperty("temperature");
  });

  it("should treat server errors as retryable", async () => {
    const { OpenAIProvider } = await import("./openai.js");
    const { ProviderError } = await import("../utils/errors.js");
    const provider = new OpenAIProvider();
    await provider.initialize({ apiKey: "test-secret" });
    mockCreate.mockRejectedValueOnce(new MockAPIError(503, "unavailable"));

    const error: unknown = await provider.chat([{ role: "user", content: "Hi" }]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    if (error instanceof ProviderError) {
      expect(error.provider).toBe("openai");
      expect(error.recoverable).toBe(true);
    }
  });

  it("should return empty content when the choice has none", async () => {
    const { OpenAIProvider } = await import("./openai.js");
    const provider = new OpenAIProvider();
    await provider.initialize({ apiKey: "test-secret" });
    mockCreate.mockResolvedValueOnce({ id: "x", choices: [], model: "gpt-4o" });

    const response = await provider.chat([{ role: "user", content: "Hi" }]);

    expect(response.content).toBe("");
    expect(response.usage).toEqual({ inputTokens: 0, outputTokens: 0 });
  });
});
