export class ReadmeError extends Error {
  constructor(
    message: string,
    public readonly internalDetails?: string,
  ) {
    super(message);
    this.name = "ReadmeError";
    Object.setPrototypeOf(this, ReadmeError.prototype);
  }
}

export class ProviderError extends ReadmeError {
  constructor(message: string, internalDetails?: string) {
    super(message, internalDetails);
    this.name = "ProviderError";
    Object.setPrototypeOf(this, ProviderError.prototype);
  }
}

/** Raised when a model response looks cut off mid-document. */
export class TruncatedOutputError extends ReadmeError {
  constructor(message: string, internalDetails?: string) {
    super(message, internalDetails);
    this.name = "TruncatedOutputError";
    Object.setPrototypeOf(this, TruncatedOutputError.prototype);
  }
}

export class GenerationError extends ReadmeError {
  constructor(message: string, internalDetails?: string) {
    super(message, internalDetails);
    this.name = "GenerationError";
    Object.setPrototypeOf(this, GenerationError.prototype);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
