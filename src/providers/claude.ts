import { ProviderError } from "../errors.js";
import { DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE, LLMProvider } from "./base.js";
import type { LLMRequest, LLMResponse } from "./types.js";

export class ClaudeProvider extends LLMProvider {
  get name(): string {
    return "claude";
  }

  async generate(request: LLMRequest): Promise<LLMResponse> {
    try {
      const { default: Anthropic } = await import("@anthropic-ai/sdk");
      const client = new Anthropic({ apiKey: this.apiKey });

      const message = await client.messages.create(
        {
          model: this.model,
          max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
          temperature: request.temperature ?? DEFAULT_TEMPERATURE,
          ...(request.systemPrompt ? { system: request.systemPrompt } : {}),
          messages: [{ role: "user", content: request.prompt }],
        },
        { signal: request.signal },
      );

      const textBlock = message.content.find((b) => b.type == "text");
      if (!textBlock || textBlock.type != "text") {
        throw new ProviderError("No text response from Claude");
      }

      return {
        content: textBlock.text,
        truncated: message.stop_reason == "max_tokens",
        usage: {
          inputTokens: message.usage.input_tokens,
          outputTokens: message.usage.output_tokens,
        },
      };
    } catch (err) {
      throw this.wrapError("Claude", err);
    }
  }
}
