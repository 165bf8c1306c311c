/**
 * Local filesystem cache for reasoning request/response pairs.
 * Used during development to avoid paying for the same validation twice while
 * iterating on prompts or on the report pipeline.
 * Cache key: <prefix>/<model id>/<messages hash>.json
 */

import { createHash } from "crypto";
import { mkdir, readFile, writeFile } from "fs/promises";
import { join, dirname } from "path";
import type { ChatMessage, ChatResponse } from "./types.js";

/**
 * Generates a SHA-256 hash truncated to 16 characters for cache key derivation.
 */
function hash(input: string): string {
  return createHash("sha256").update(input).digest("hex").slice(0, 16);
}

/**
 * Derives a deterministic cache key from the model identifier and the full message list.
 */
function getCacheKey(
  messages: ChatMessage[],
  model: string,
): { modelId: string; messagesHash: string } {
  // Sanitize model name for filesystem
  const modelId = model.replace(/[^a-zA-Z0-9.-]/g, "_");
  const messagesHash = hash(
    messages.map((message) => `${message.role}:${message.content}`).join("\n"),
  );

  return { modelId, messagesHash };
}

export class LLMCache {
  constructor(private cacheDir: string) {}

  private getCachePath(
    prefix: string,
    modelId: string,
    messagesHash: string,
  ): string {
    return join(this.cacheDir, prefix, modelId, `${messagesHash}.json`);
  }

  /**
   * Retrieves a cached response for an identical message list, or null on miss.
   */
  async get(
    messages: ChatMessage[],
    model: string,
    prefix: string = "default",
  ): Promise<ChatResponse | null> {
    const { modelId, messagesHash } = getCacheKey(messages, model);
    const cachePath = this.getCachePath(prefix, modelId, messagesHash);

    let data: string;
    try {
      data = await readFile(cachePath, "utf-8");
    } catch {
      return null;
    }

    try {
      const cached: unknown = JSON.parse(data);
      if (
        typeof cached === "object" &&
        cached !== null &&
        "content" in cached &&
        typeof cached.content === "string"
      ) {
        return { content: cached.content, model, cached: true };
      }
    } catch (error) {
      console.warn(`[LLMCache] Ignoring unreadable entry ${cachePath}:`, error);
    }
    return null;
  }

  async set(
    messages: ChatMessage[],
    model: string,
    response: ChatResponse,
    prefix: string = "default",
  ): Promise<void> {
    const { modelId, messagesHash } = getCacheKey(messages, model);
    const cachePath = this.getCachePath(prefix, modelId, messagesHash);

    await mkdir(dirname(cachePath), { recursive: true });
    await writeFile(cachePath, JSON.stringify(response, null, 2), "utf-8");

    console.log(`[LLMCache] Cached response to ${cachePath}`);
  }
}

export { getCacheKey, hash };
