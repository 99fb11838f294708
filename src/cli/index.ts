#!/usr/bin/env node
import "dotenv/config";
import { loadConfig } from "../config/env.js";
import { createLLMProvider, isProviderError } from "../providers/index.js";

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const showRaw = args.includes("--raw");
  const question = args.filter((arg) => arg !== "--raw").join(" ");

  if (!question) {
    console.error('Usage: npm run cli -- [--raw] "your question here"');
    process.exit(1);
  }

  const config = loadConfig();
  const llm = createLLMProvider(config.provider);

  try {
    const { answer, raw } = await llm.ask(question);
    console.log(answer);
    if (showRaw && raw !== undefined) {
      console.log(JSON.stringify(raw, null, 2));
    }
  } catch (error) {
    const detail = isProviderError(error) ? `[${error.kind}] ${error.message}` : String(error);
    console.error(`Failed to generate response: ${detail}`);
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
