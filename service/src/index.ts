/**
 * Service Entry Point
 *
 * Wires configuration, storage, the reasoning client and the HTTP app, then listens.
 */

import "dotenv/config";
import { createApp } from "./app.js";
import { getAppConfig } from "./config.js";
import { createStorageClient, SupabaseObjectStore } from "./storage.js";
import { pdfTextExtractor } from "./pdf-extract.js";
import { RulesCache } from "./rules-cache.js";
import { LLMClient } from "./llm/index.js";
import { getDefaultConfig } from "./llm/types.js";
import { ClaimValidator } from "./pipeline/claim-validator.js";

const config = getAppConfig();
const llmConfig = getDefaultConfig();

const store = new SupabaseObjectStore(createStorageClient());
const rules = new RulesCache(store, pdfTextExtractor, config.rules);
const validator = new ClaimValidator(new LLMClient(llmConfig), {
  maxTokens: llmConfig.text.maxTokens,
  temperature: llmConfig.text.temperature,
});

const app = createApp({
  config,
  validator,
  rules,
  extractor: pdfTextExtractor,
});

// ============================================================================
// Server Startup
// ============================================================================

const server = app.listen(config.port, () => {
  console.log(`[Server] Claim validator listening on port ${config.port}`);
  console.log(`[Server] Version: ${config.version}`);
  console.log(`[Server] claimType: ${config.claimType}`);
  console.log(`[Server] rules: ${config.rules.bucket}/${config.rules.key}`);
  console.log(`[Server] text.provider: ${llmConfig.text.provider}`);
  console.log(`[Server] text.model: ${llmConfig.text.model}`);
  console.log(`[Server] text.endpoint: ${llmConfig.text.endpoint}`);
  console.log(`[Server] cache.enabled: ${llmConfig.cache.enabled}`);
  console.log(`[Server] cache.dir: ${llmConfig.cache.dir}`);
});

// ============================================================================
// Graceful Shutdown
// ============================================================================

function shutdown(signal: string, exitCode = 0): void {
  console.log(`[Server] Received ${signal}, shutting down gracefully...`);

  server.close((error) => {
    if (error) {
      console.error("[Server] Error while closing:", error);
      process.exit(1);
    }
    console.log("[Server] Shutdown complete");
    process.exit(exitCode);
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));

// Handle uncaught errors
process.on("uncaughtException", (error) => {
  console.error("[Server] Uncaught exception:", error);
  shutdown("uncaughtException", 1);
});

process.on("unhandledRejection", (reason, promise) => {
  console.error("[Server] Unhandled rejection at:", promise, "reason:", reason);
});
