import type { FastifyInstance } from "fastify";
import { isProviderError, type LLMProvider } from "../providers/index.js";

export interface AskRequestBody {
  question: string;
}

export interface AskResponseBody {
  response: string;
  raw?: unknown;
}

export interface ErrorResponseBody {
  error: string;
}

export const GENERIC_ASK_ERROR = "Failed to generate response";

/**
 * Register the question-answering route.
 *
 * POST /ask – forward one question to the shared provider
 */
export function registerAskRoutes(fastify: FastifyInstance, llm: LLMProvider): void {
  fastify.post<{ Body: AskRequestBody }>("/ask", {
    schema: {
      body: {
        type: "object",
        required: ["question"],
        properties: {
          question: { type: "string", minLength: 1 },
        },
      },
    },
    handler: async (req, reply) => {
      req.log.info({ question: req.body.question }, "Received question");

      try {
        const { answer, raw } = await llm.ask(req.body.question);
        req.log.info("Successfully generated response");

        const body: AskResponseBody = raw === undefined ? { response: answer } : { response: answer, raw };
        return reply.code(200).send(body);
      } catch (error) {
        // Upstream status and bodies stay in the log.
        req.log.error(
          {
            err: error,
            kind: isProviderError(error) ? error.kind : "unexpected",
            provider: llm.name,
          },
          GENERIC_ASK_ERROR,
        );
        const failure: ErrorResponseBody = { error: GENERIC_ASK_ERROR };
        return reply.code(500).send(failure);
      }
    },
  });
}
