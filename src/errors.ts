export class FaqdeskError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause ? { cause } : undefined);
    this.name = "FaqdeskError";
  }
}

export class InvalidInputError extends FaqdeskError {
  constructor(message = "Please send a question.") {
    super(message);
    this.name = "InvalidInputError";
  }
}

export class ProviderTimeoutError extends FaqdeskError {
  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "ProviderTimeoutError";
  }
}

export class EmbeddingUnavailableError extends FaqdeskError {
  constructor(detail: string, cause?: unknown) {
    super(`Embedding unavailable: ${detail}`, cause);
    this.name = "EmbeddingUnavailableError";
  }
}

export class CompletionUnavailableError extends FaqdeskError {
  constructor(detail: string, cause?: unknown) {
    super(`Completion unavailable: ${detail}`, cause);
    this.name = "CompletionUnavailableError";
  }
}

export class CorpusFormatError extends FaqdeskError {
  constructor(message: string) {
    super(message);
    this.name = "CorpusFormatError";
  }
}

export class IndexFormatError extends FaqdeskError {
  constructor(message: string) {
    super(message);
    this.name = "IndexFormatError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
