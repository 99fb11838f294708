import OpenAI, {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  type ClientOptions,
} from "openai";
import pino, { type Logger } from "pino";
import { ConfigError } from "../config/errors.js";
import {
  EmptyResponseError,
  HttpStatusError,
  NetworkError,
  ParseError,
  ProviderError,
  SchemaError,
} from "./errors.js";
import type { AskResult, LLMProvider, ProviderConfig } from "./llm-provider.js";
import { ChatRequestSchema, ChatResponseSchema, type ChatRequest } from "./types.js";

const defaultLogger = pino({ name: "openai-llm" });

export const MAX_TOKENS = 64;
export const TEMPERATURE = 0;
export const REQUEST_TIMEOUT_MS = 20_000;

export const MOCK_ANSWER = "This is a mock response for testing purposes.";
export const MOCK_RESPONSE_ID = "mock-123";

export function buildChatRequest(model: string, question: string): ChatRequest {
  return ChatRequestSchema.parse({
    model,
    messages: [{ role: "user", content: question }],
    max_tokens: MAX_TOKENS,
    temperature: TEMPERATURE,
  });
}

/** Canned payload with the same shape as a real chat completion. */
export function buildMockPayload(model: string) {
  return {
    id: MOCK_RESPONSE_ID,
    object: "chat.completion",
    created: 0,
    model,
    choices: [
      {
        index: 0,
        message: { role: "assistant", content: MOCK_ANSWER },
        finish_reason: "stop",
      },
    ],
    usage: { prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 },
  };
}

/**
 * Turn a chat completion body into an answer.
 *
 * `raw` is the value JSON.parse produced, not a re-encoding of the typed
 * view, so provider fields the schema ignores are kept.
 */
export function parseCompletion(body: string): AskResult {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch (err) {
    throw new ParseError("Provider response body is not valid JSON", { cause: err });
  }

  const parsed = ChatResponseSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new SchemaError(`Provider response does not match the chat completion shape: ${issues}`, {
      cause: parsed.error,
    });
  }

  const content = parsed.data.choices[0]?.message.content;
  if (!content) {
    throw new EmptyResponseError();
  }

  return { answer: content, raw };
}

type Fetch = NonNullable<ClientOptions["fetch"]>;

/**
 * fetch for the SDK client. Logs the text of every non-2xx body before the
 * SDK reduces it to an APIError.
 */
function loggingFetch(logger: Logger): Fetch {
  return async (input, init) => {
    const response = await fetch(input, init);
    if (!response.ok) {
      const body = await response
        .clone()
        .text()
        .catch((err: unknown) => `<unreadable body: ${err instanceof Error ? err.message : String(err)}>`);
      logger.error({ status: response.status, body }, "Provider returned an error status");
    }
    return response;
  };
}

/** Read the body, giving up as soon as `signal` aborts. */
function readBody(response: Response, signal: AbortSignal): Promise<string> {
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }
  return new Promise<string>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    response.text().then(
      (text) => {
        signal.removeEventListener("abort", onAbort);
        resolve(text);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

function toProviderError(err: unknown, deadline: AbortSignal, timeoutMs: number): ProviderError {
  if (err instanceof ProviderError) {
    return err;
  }
  // Timeout is a subclass of APIConnectionError, so it has to come first.
  if (deadline.aborted || err instanceof APIConnectionTimeoutError) {
    return new NetworkError(`Provider request timed out after ${timeoutMs}ms`, {
      timedOut: true,
      cause: err,
    });
  }
  if (err instanceof APIConnectionError) {
    return new NetworkError(`Could not reach provider: ${err.message}`, { cause: err });
  }
  if (err instanceof APIError && err.status !== undefined) {
    return new HttpStatusError(err.status, { cause: err });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new NetworkError(`Provider request failed: ${message}`, { cause: err });
}

export interface OpenAILLMOptions {
  /** Defaults to the SDK's https://api.openai.com/v1. */
  baseURL?: string;
  /** Deadline for the whole call: connect, send and reading the body. */
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * OpenAI chat-completions provider.
 *
 * With `mockMode` set, every call returns canned data and no request is
 * made. The flag is fixed for the life of the instance.
 */
export class OpenAILLM implements LLMProvider {
  readonly name: string;
  private readonly model: string;
  private readonly mockMode: boolean;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly client: OpenAI;

  constructor(config: ProviderConfig, options: OpenAILLMOptions = {}) {
    if (!config.mockMode && !config.apiKey) {
      throw new ConfigError("OPENAI_API_KEY is required unless mock mode is enabled.");
    }
    if (!config.model) {
      throw new ConfigError("A model identifier is required.");
    }

    this.model = config.model;
    this.mockMode = config.mockMode;
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.logger = options.logger ?? defaultLogger;
    this.name = config.mockMode ? `OpenAI/${config.model} (mock)` : `OpenAI/${config.model}`;
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: options.baseURL,
      timeout: this.timeoutMs,
      maxRetries: 0,
      fetch: loggingFetch(this.logger),
    });
  }

  async ask(question: string): Promise<AskResult> {
    if (this.mockMode) {
      return { answer: MOCK_ANSWER, raw: buildMockPayload(this.model) };
    }

    const body = await this.send(buildChatRequest(this.model, question));
    return parseCompletion(body);
  }

  private async send(request: ChatRequest): Promise<string> {
    this.logger.debug({ model: request.model }, "Sending chat completion request");

    // The SDK's own timeout stops once headers arrive; this one also covers the body.
    const deadline = AbortSignal.timeout(this.timeoutMs);

    try {
      // asResponse() skips the SDK's own parsing so the body can be classified here.
      const response = await this.client.chat.completions
        .create(request, { signal: deadline })
        .asResponse();
      return await readBody(response, deadline);
    } catch (err) {
      throw toProviderError(err, deadline, this.timeoutMs);
    }
  }
}
