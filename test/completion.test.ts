import { describe, it, expect, vi } from "vitest";
import { CompletionService } from "../src/core/completion.js";
import { SYSTEM_PROMPT } from "../src/core/prompts.js";
import { ProviderError, TruncatedOutputError } from "../src/errors.js";
import { DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE, LLMProvider } from "../src/providers/base.js";
import type { LLMRequest, LLMResponse } from "../src/providers/types.js";

class FakeProvider extends LLMProvider {
  public readonly requests: LLMRequest[] = [];

  constructor(private readonly reply: (request: LLMRequest) => Promise<string | LLMResponse>) {
    super("fake-model");
  }

  get name(): string {
    return "Fake";
  }

  async generate(request: LLMRequest): Promise<LLMResponse> {
    this.requests.push(request);
    try {
      const reply = await this.reply(request);
      return typeof reply == "string" ? { content: reply } : reply;
    } catch (err) {
      throw this.wrapError(this.name, err);
    }
  }
}

function waitForAbort(signal: AbortSignal | undefined): Promise<string> {
  return new Promise((_, reject) => {
    if (!signal) return;
    signal.addEventListener("abort", () => reject(signal.reason));
  });
}

describe("CompletionService", () => {
  it("trims the response and applies default settings", async () => {
    const provider = new FakeProvider(async () => "  ## Usage\n\nRun it.\n\n");
    const service = new CompletionService(provider);

    expect(await service.complete("prompt")).toBe("## Usage\n\nRun it.");
    expect(provider.requests[0]).toMatchObject({
      prompt: "prompt",
      maxTokens: DEFAULT_MAX_TOKENS,
      temperature: DEFAULT_TEMPERATURE,
    });
    expect(provider.requests[0].signal).toBeInstanceOf(AbortSignal);
  });

  it("sends the configured system prompt with every request", async () => {
    const provider = new FakeProvider(async () => "ok");
    const service = new CompletionService(provider, { systemPrompt: SYSTEM_PROMPT });

    await service.complete("a");
    await service.complete("b", { maxTokens: 9000 });

    expect(provider.requests.map((r) => r.systemPrompt)).toEqual([SYSTEM_PROMPT, SYSTEM_PROMPT]);
  });

  it("omits the system prompt when none is configured", async () => {
    const provider = new FakeProvider(async () => "ok");
    await new CompletionService(provider).complete("a");
    expect(provider.requests[0].systemPrompt).toBeUndefined();
  });

  it("lets a call override the token ceiling", async () => {
    const provider = new FakeProvider(async () => "ok");
    const service = new CompletionService(provider, { maxOutputTokens: 1000, temperature: 0.7 });

    await service.complete("a");
    await service.complete("b", { maxTokens: 9000 });

    expect(provider.requests.map((r) => r.maxTokens)).toEqual([1000, 9000]);
    expect(provider.requests[1].temperature).toBe(0.7);
  });

  it("rejects empty output", async () => {
    const service = new CompletionService(new FakeProvider(async () => "   \n"));
    await expect(service.complete("prompt")).rejects.toThrow("Empty completion from Fake");
  });

  it("surfaces provider failures as ProviderError", async () => {
    const service = new CompletionService(
      new FakeProvider(async () => {
        throw new Error("429 quota exceeded");
      }),
    );

    const error = await service.complete("prompt").catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ProviderError);
    expect(error instanceof ProviderError ? [error.message, error.internalDetails] : []).toEqual([
      "Fake API error",
      "429 quota exceeded",
    ]);
  });

  it("warns about a token-limit stop by default", async () => {
    const warn = vi.fn();
    const service = new CompletionService(
      new FakeProvider(async () => ({ content: "## Usage\n\nRun", truncated: true })),
      { maxOutputTokens: 100 },
      { debug: vi.fn(), info: vi.fn(), warn, error: vi.fn() },
    );

    expect(await service.complete("prompt")).toBe("## Usage\n\nRun");
    expect(warn).toHaveBeenCalledWith("Fake stopped at the 100 token limit");
  });

  it("rejects a token-limit stop when asked to", async () => {
    const service = new CompletionService(
      new FakeProvider(async () => ({ content: "partial", truncated: true })),
    );

    await expect(service.complete("prompt", { rejectTruncated: true })).rejects.toBeInstanceOf(
      TruncatedOutputError,
    );
  });

  it("times out slow calls", async () => {
    const service = new CompletionService(
      new FakeProvider((request) => waitForAbort(request.signal)),
      { timeoutMs: 20 },
    );

    await expect(service.complete("prompt")).rejects.toThrow("Fake request timed out");
  });
});
