import { ProviderError, TruncatedOutputError } from "../errors.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import {
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  type LLMProvider,
} from "../providers/base.js";

export const DEFAULT_FALLBACK_MAX_TOKENS = 8192;
export const DEFAULT_TIMEOUT_MS = 120_000;

export interface CompletionOptions {
  maxTokens?: number;
  temperature?: number;
  /** Fail with TruncatedOutputError instead of warning when the token limit is hit. */
  rejectTruncated?: boolean;
}

/**
 * One model invocation: prompt in, text out. Every failure mode (network,
 * quota, rejection, timeout, empty output) surfaces as a ProviderError.
 */
export interface CompletionClient {
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

export interface CompletionSettings {
  maxOutputTokens?: number;
  temperature?: number;
  timeoutMs?: number;
  systemPrompt?: string;
}

export class CompletionService implements CompletionClient {
  private readonly maxOutputTokens: number;
  private readonly temperature: number;
  private readonly timeoutMs: number;
  private readonly systemPrompt: string | undefined;

  constructor(
    private readonly provider: LLMProvider,
    settings: CompletionSettings = {},
    private readonly logger: Logger = silentLogger,
  ) {
    this.maxOutputTokens = settings.maxOutputTokens ?? DEFAULT_MAX_TOKENS;
    this.temperature = settings.temperature ?? DEFAULT_TEMPERATURE;
    this.timeoutMs = settings.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.systemPrompt = settings.systemPrompt;
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const maxTokens = options.maxTokens ?? this.maxOutputTokens;
    const response = await this.provider.generate({
      prompt,
      systemPrompt: this.systemPrompt,
      maxTokens,
      temperature: options.temperature ?? this.temperature,
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (response.usage) {
      this.logger.debug(
        `${this.provider.name}: ${response.usage.inputTokens} in / ${response.usage.outputTokens} out (max ${maxTokens})`,
      );
    }

    if (response.truncated) {
      const message = `${this.provider.name} stopped at the ${maxTokens} token limit`;
      if (options.rejectTruncated) throw new TruncatedOutputError(message);
      this.logger.warn(message);
    }

    const text = response.content.trim();
    if (!text) {
      throw new ProviderError(`Empty completion from ${this.provider.name}`);
    }
    return text;
  }
}
