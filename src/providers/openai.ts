import { ProviderError } from "../errors.js";
import { DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE, LLMProvider } from "./base.js";
import type { LLMRequest, LLMResponse } from "./types.js";

export class OpenAIProvider extends LLMProvider {
  get name(): string {
    return "openai";
  }

  async generate(request: LLMRequest): Promise<LLMResponse> {
    try {
      const { default: OpenAI } = await import("openai");
      const client = new OpenAI({ apiKey: this.apiKey });

      const messages: Array<{ role: "system" | "user"; content: string }> = [];
      if (request.systemPrompt) {
        messages.push({ role: "system", content: request.systemPrompt });
      }
      messages.push({ role: "user", content: request.prompt });

      const response = await client.chat.completions.create(
        {
          model: this.model,
          max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
          temperature: request.temperature ?? DEFAULT_TEMPERATURE,
          messages,
        },
        { signal: request.signal },
      );

      const choice = response.choices[0];
      const content = choice?.message?.content;
      if (!content) {
        throw new ProviderError("No response from OpenAI");
      }

      return {
        content,
        truncated: choice?.finish_reason == "length",
        usage: response.usage
          ? {
              inputTokens: response.usage.prompt_tokens,
              outputTokens: response.usage.completion_tokens ?? 0,
            }
          : undefined,
      };
    } catch (err) {
      throw this.wrapError("OpenAI", err);
    }
  }
}
