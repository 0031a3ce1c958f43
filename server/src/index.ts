import { serve } from "@hono/node-server";
import { createApp } from "./app";
import { loadEnv, type Env } from "./utils/env-vars";
import { logger } from "./utils/logger";
import { createGeminiExtractor } from "./services/gen-ai";
import { loadInstructionTemplate } from "./services/instruction";
import { SessionStore } from "./services/session-store";

let env: Env;
try {
  env = loadEnv();
} catch (err) {
  logger.error("Invalid configuration, GEMINI_API_KEY must be set:", err);
  process.exit(1);
}

const instructionTemplate = await loadInstructionTemplate(env.INSTRUCTION_TEMPLATE_PATH);

const app = createApp({
  sessions: new SessionStore({ ttlMs: env.SESSION_TTL_MINUTES * 60 * 1000 }),
  extractor: createGeminiExtractor({
    apiKey: env.GEMINI_API_KEY,
    model: env.GEMINI_MODEL,
    timeoutMs: env.EXTRACTION_TIMEOUT_MS,
  }),
  instructionTemplate,
  maxFileSize: env.MAX_FILE_SIZE,
  staticRoot: env.STATIC_ROOT,
});

serve({ fetch: app.fetch, port: env.APP_PORT }, (info) => {
  logger.info(`InvoiceIntel listening on http://localhost:${info.port} (model ${env.GEMINI_MODEL})`);
});
