import { Tiktoken } from "js-tiktoken/lite";
import o200k_base from "js-tiktoken/ranks/o200k_base";

const encoder = new Tiktoken(o200k_base);

/**
 * Caps how much repository text goes into prompts. Token counts use the
 * o200k_base encoding, close enough for every supported provider.
 */
export class TokenBudget {
  private constructor(
    private encoder: Tiktoken,
    private pool: number,
  ) {}

  public static create(maxTokens: number): TokenBudget {
    return new TokenBudget(encoder, maxTokens);
  }

  public get remaining(): number {
    return this.pool;
  }

  public count(text: string): number {
    return this.encoder.encode(text).length;
  }

  public trySpend(text: string): boolean {
    const cost = this.count(text);

    if (this.pool >= cost) {
      this.pool -= cost;
      return true;
    }
    return false;
  }
}
