import { ProviderError, errorMessage } from "../errors.js";
import type { LLMRequest, LLMResponse } from "./types.js";

export const DEFAULT_MAX_TOKENS = 4096;
export const DEFAULT_TEMPERATURE = 0.2;

export abstract class LLMProvider {
  constructor(
    protected model: string,
    protected apiKey?: string,
  ) {}

  abstract generate(request: LLMRequest): Promise<LLMResponse>;

  abstract get name(): string;

  protected wrapError(label: string, err: unknown): ProviderError {
    if (err instanceof ProviderError) return err;
    // AbortSignal.timeout() aborts with a TimeoutError, a manual abort with AbortError
    if (err instanceof Error && (err.name == "TimeoutError" || err.name == "AbortError")) {
      return new ProviderError(`${label} request timed out`, err.message);
    }
    return new ProviderError(`${label} API error`, errorMessage(err));
  }
}
