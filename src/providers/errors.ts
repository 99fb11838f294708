/**
 * Failures raised by an LLMProvider. Every `ask` call either resolves with
 * an answer or rejects with exactly one of these.
 */
export type ProviderErrorKind = "network" | "http_status" | "parse" | "schema" | "empty_response";

export abstract class ProviderError extends Error {
  abstract readonly kind: ProviderErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Connection, transport or timeout failure before a response arrived. */
export class NetworkError extends ProviderError {
  readonly kind = "network";
  readonly timedOut: boolean;

  constructor(message: string, options: { timedOut?: boolean; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.timedOut = options.timedOut ?? false;
  }
}

export class HttpStatusError extends ProviderError {
  readonly kind = "http_status";
  readonly status: number;

  constructor(status: number, options?: { cause?: unknown }) {
    super(`Provider responded with HTTP ${status}`, options);
    this.status = status;
  }
}

/** The body was not valid JSON. */
export class ParseError extends ProviderError {
  readonly kind = "parse";
}

/** The body was JSON but not a chat completion. */
export class SchemaError extends ProviderError {
  readonly kind = "schema";
}

export class EmptyResponseError extends ProviderError {
  readonly kind = "empty_response";

  constructor() {
    super("Provider returned no choices");
  }
}

export function isProviderError(value: unknown): value is ProviderError {
  return value instanceof ProviderError;
}
