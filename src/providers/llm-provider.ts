/**
 * LLMProvider interface – plug in any LLM backend.
 * Callers hold this type, never a concrete provider.
 */
export interface LLMProvider {
  readonly name: string;

  /**
   * Ask a single question. Resolves with the answer text and, on a real
   * or mocked provider response, the parsed payload exactly as received.
   * Rejects with a ProviderError.
   */
  ask(question: string): Promise<AskResult>;
}

export interface AskResult {
  answer: string;
  raw?: unknown;
}

export interface ProviderConfig {
  apiKey: string;
  model: string;
  mockMode: boolean;
}
