import "dotenv/config";
import pino from "pino";
import { loadConfig } from "../config/env.js";
import { createLLMProvider } from "../providers/index.js";
import { buildServer } from "./app.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({ name: "ask-service", level: config.logLevel });
  logger.info(
    { model: config.provider.model, mockMode: config.provider.mockMode },
    "Starting ask-service",
  );

  const llm = createLLMProvider(config.provider, {
    logger: logger.child({ component: "openai-llm" }),
  });
  const server = buildServer({ llm, logLevel: config.logLevel });

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      server.log.info({ signal }, "Shutting down");
      server.close().then(
        () => process.exit(0),
        (err: unknown) => {
          server.log.error(err);
          process.exit(1);
        },
      );
    });
  }

  try {
    await server.listen({ port: config.port, host: config.host });
    server.log.info(`Health: http://${config.host}:${config.port}/health`);
  } catch (err) {
    server.log.error(err);
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  pino({ name: "ask-service" }).fatal({ err }, "Failed to start");
  process.exit(1);
});
