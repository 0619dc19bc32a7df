/**
 * Interactive terminal chat with a hosted language model. Prompts may carry
 * images, PDFs, Markdown, HTML, source code and plain-text files.
 *
 * Usage:
 *   GEMINI_API_KEY=... npm start
 *   LLM_PROVIDER=openai OPENAI_API_KEY=... npm start
 *
 * Settings come from the environment or a `.env` file in the working
 * directory (see src/core/settings.ts). Replies go to stdout; diagnostics to
 * stderr.
 */

import { createInterface } from "node:readline/promises";
import { GenerationClient } from "../core/client";
import { defaultGenerationConfig } from "../core/config";
import { ConfigurationError } from "../core/errors";
import { createConsoleLogger } from "../core/logger";
import { createProvider } from "../core/providers";
import { createDefaultRegistry } from "../core/readers";
import { loadEnvFile, loadSettings, SUGGESTED_MODELS, type AppSettings } from "../core/settings";
import { Shell, type ShellIO } from "./shell";

function startup(): AppSettings {
  try {
    loadEnvFile();
    return loadSettings();
  } catch (err) {
    if (err instanceof ConfigurationError) {
      console.error(err.message);
      process.exit(1);
    }
    throw err;
  }
}

async function main(): Promise<void> {
  const settings = startup();
  const logger = createConsoleLogger("mediaprompt", settings.logLevel);

  const client = new GenerationClient({
    provider: createProvider(settings),
    credential: settings.credential,
    config: defaultGenerationConfig(settings.model),
    timeoutMs: settings.timeoutMs,
    logger,
  });

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  let closed = false;
  rl.on("close", () => {
    closed = true;
  });

  const io: ShellIO = {
    async ask(question) {
      if (closed) return null;
      try {
        return await rl.question(question);
      } catch (err) {
        // question() rejects once stdin has ended
        if (closed) return null;
        throw err;
      }
    },
    print(text) {
      console.log(text);
    },
  };

  const shell = new Shell({
    client,
    registry: createDefaultRegistry(),
    io,
    suggestedModels: SUGGESTED_MODELS[settings.provider],
    strictFiles: settings.strictFiles,
    maxPayloadBytes: settings.maxPayloadBytes,
    logger,
  });

  logger.debug(`Provider ${settings.provider}, model ${settings.model}, timeout ${settings.timeoutMs} ms`);
  try {
    await shell.run();
  } finally {
    rl.close();
  }
}

main().catch((err) => {
  console.error("[mediaprompt] Fatal:", err);
  process.exit(1);
});
