import { describe, it, expect, vi, afterEach } from "vitest";
import { buildServer } from "../../server/app.js";
import {
  HttpStatusError,
  OpenAILLM,
  type AskResult,
  type LLMProvider,
} from "../../providers/index.js";

function stubProvider(ask: (question: string) => Promise<AskResult>): LLMProvider {
  return { name: "stub", ask: vi.fn(ask) };
}

describe("server", () => {
  let server: ReturnType<typeof buildServer> | undefined;

  afterEach(async () => {
    await server?.close();
    server = undefined;
  });

  it("should report health", async () => {
    server = buildServer({ llm: stubProvider(async () => ({ answer: "x" })), logLevel: "silent" });

    const res = await server.inject({ method: "GET", url: "/health" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: "ok" });
  });

  it("should answer through a mock-mode provider", async () => {
    const llm = new OpenAILLM({ apiKey: "mock-api-key", model: "gpt-4o-mini", mockMode: true });
    server = buildServer({ llm, logLevel: "silent" });

    const res = await server.inject({
      method: "POST",
      url: "/ask",
      payload: { question: "Test question" },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.response).toBe("This is a mock response for testing purposes.");
    expect(body.raw.id).toBe("mock-123");
    expect(body.raw.model).toBe("gpt-4o-mini");
  });

  it("should call the provider once with the question", async () => {
    const llm = stubProvider(async () => ({ answer: "42" }));
    server = buildServer({ llm, logLevel: "silent" });

    const res = await server.inject({
      method: "POST",
      url: "/ask",
      payload: { question: "Meaning of life?" },
    });

    expect(llm.ask).toHaveBeenCalledOnce();
    expect(llm.ask).toHaveBeenCalledWith("Meaning of life?");
    expect(res.json()).toEqual({ response: "42" });
  });

  it("should hide provider failures behind a generic 500", async () => {
    const llm = stubProvider(async () => {
      throw new HttpStatusError(401);
    });
    server = buildServer({ llm, logLevel: "silent" });

    const res = await server.inject({
      method: "POST",
      url: "/ask",
      payload: { question: "Hello" },
    });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: "Failed to generate response" });
  });

  it("should survive unexpected errors", async () => {
    const llm = stubProvider(async () => {
      throw new Error("boom");
    });
    server = buildServer({ llm, logLevel: "silent" });

    const res = await server.inject({
      method: "POST",
      url: "/ask",
      payload: { question: "Hello" },
    });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: "Failed to generate response" });
  });

  it.each([{}, { question: "" }, { question: 7 }])("should reject body %j", async (payload) => {
    const llm = stubProvider(async () => ({ answer: "unused" }));
    server = buildServer({ llm, logLevel: "silent" });

    const res = await server.inject({ method: "POST", url: "/ask", payload });

    expect(res.statusCode).toBe(400);
    expect(llm.ask).not.toHaveBeenCalled();
  });
});
