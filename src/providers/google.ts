import { ProviderError } from "../errors.js";
import { DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE, LLMProvider } from "./base.js";
import type { LLMRequest, LLMResponse } from "./types.js";

export class GoogleProvider extends LLMProvider {
  get name(): string {
    return "google";
  }

  async generate(request: LLMRequest): Promise<LLMResponse> {
    try {
      const { FinishReason, GoogleGenAI } = await import("@google/genai");
      const client = new GoogleGenAI({ apiKey: this.apiKey });

      const message = await client.models.generateContent({
        model: this.model,
        contents: request.prompt,
        config: {
          maxOutputTokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
          temperature: request.temperature ?? DEFAULT_TEMPERATURE,
          ...(request.systemPrompt
            ? { systemInstruction: request.systemPrompt }
            : {}),
          ...(request.signal ? { abortSignal: request.signal } : {}),
        },
      });

      const content = message.text;
      if (!content) {
        throw new ProviderError("No response from Gemini");
      }

      return {
        content,
        truncated: message.candidates?.[0]?.finishReason == FinishReason.MAX_TOKENS,
        usage: message.usageMetadata
          ? {
              inputTokens: message.usageMetadata.promptTokenCount ?? 0,
              outputTokens: message.usageMetadata.candidatesTokenCount ?? 0,
            }
          : undefined,
      };
    } catch (err) {
      throw this.wrapError("Gemini", err);
    }
  }
}
