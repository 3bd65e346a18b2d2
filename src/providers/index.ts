import type { LLMProvider } from "./base.js";
import { ClaudeProvider } from "./claude.js";
import { GoogleProvider } from "./google.js";
import { OpenAIProvider } from "./openai.js";
import { Provider } from "./types.js";
import type { ConfigData } from "../core/types.js";
import { ProviderError } from "../errors.js";

export const DEFAULT_MODELS: Record<Provider, string> = {
  [Provider.GOOGLE]: "gemini-2.5-pro",
  [Provider.OPENAI]: "gpt-4o",
  [Provider.CLAUDE]: "claude-sonnet-4-20250514",
};

export function createProvider(
  config: Pick<ConfigData, "provider" | "model" | "apiKey">,
): LLMProvider {
  const model = config.model || DEFAULT_MODELS[config.provider];

  switch (config.provider) {
    case Provider.GOOGLE:
      return new GoogleProvider(model, config.apiKey);
    case Provider.OPENAI:
      return new OpenAIProvider(model, config.apiKey);
    case Provider.CLAUDE:
      return new ClaudeProvider(model, config.apiKey);
    default:
      throw new ProviderError(`Unknown provider: ${String(config.provider)}`);
  }
}

export { LLMProvider } from "./base.js";
