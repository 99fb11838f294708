import { describe, it, expect, vi } from "vitest";
import { createLLMProvider, OpenAILLM, MOCK_ANSWER } from "../../providers/index.js";
import { ConfigError } from "../../config/errors.js";

// Mock OpenAI SDK so no real client is built
vi.mock("openai", async (importOriginal) => {
  const actual = await importOriginal<typeof import("openai")>();
  return {
    ...actual,
    default: class MockOpenAI {
      chat = { completions: { create: vi.fn() } };
    },
  };
});

describe("createLLMProvider", () => {
  it("should return an OpenAILLM", () => {
    const llm = createLLMProvider({ apiKey: "test-key", model: "gpt-4o-mini", mockMode: false });
    expect(llm).toBeInstanceOf(OpenAILLM);
    expect(llm.name).toBe("OpenAI/gpt-4o-mini");
  });

  it("should honour mock mode", async () => {
    const llm = createLLMProvider({ apiKey: "mock-api-key", model: "gpt-4o-mini", mockMode: true });
    const result = await llm.ask("anything");
    expect(result.answer).toBe(MOCK_ANSWER);
  });

  it("should fail eagerly without credentials", () => {
    expect(() => createLLMProvider({ apiKey: "", model: "gpt-4o-mini", mockMode: false })).toThrow(
      ConfigError,
    );
  });
});
