export interface LLMRequest {
  prompt: string;
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
}

export interface LLMResponse {
  content: string;
  /** The provider stopped because it hit the output token limit. */
  truncated?: boolean;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

export enum Provider {
  GOOGLE = "google",
  OPENAI = "openai",
  CLAUDE = "claude",
}
