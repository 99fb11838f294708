/**
 * Provider factory.
 *
 * Usage:
 *   import { createLLMProvider } from "../providers/index.js";
 *   const llm = createLLMProvider({ apiKey, model, mockMode });
 *
 * The returned instance is meant to be built once at startup and shared.
 */
export { OpenAILLM, MOCK_ANSWER, MOCK_RESPONSE_ID, type OpenAILLMOptions } from "./openai-llm.js";
export type { AskResult, LLMProvider, ProviderConfig } from "./llm-provider.js";
export {
  ProviderError,
  NetworkError,
  HttpStatusError,
  ParseError,
  SchemaError,
  EmptyResponseError,
  isProviderError,
  type ProviderErrorKind,
} from "./errors.js";

import type { LLMProvider, ProviderConfig } from "./llm-provider.js";
import { OpenAILLM, type OpenAILLMOptions } from "./openai-llm.js";

export function createLLMProvider(config: ProviderConfig, options?: OpenAILLMOptions): LLMProvider {
  return new OpenAILLM(config, options);
}
