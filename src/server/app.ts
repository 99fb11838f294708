import Fastify from "fastify";
import type { LogLevel } from "../config/env.js";
import type { LLMProvider } from "../providers/index.js";
import { registerAskRoutes } from "./askRoutes.js";

export interface ServerOptions {
  /** Shared by every request for the lifetime of the server. */
  llm: LLMProvider;
  logLevel?: LogLevel;
}

export function buildServer(options: ServerOptions) {
  const fastify = Fastify({ logger: { level: options.logLevel ?? "info" } });

  // ── Health check ──────────────────────────────────────────────────
  fastify.get("/health", async () => {
    return { status: "ok" };
  });

  // ── POST /ask ─────────────────────────────────────────────────────
  registerAskRoutes(fastify, options.llm);

  return fastify;
}
