/**
 * Client for the external reasoning service.
 * Picks the configured provider (Anthropic, OpenAI-compatible, Ollama) and manages the
 * optional development cache transparently.
 */

import type {
  LLMProvider,
  ChatMessage,
  ChatRequestOptions,
  LLMConfig,
  ModelConfig,
  ProviderName,
  ReasoningClient,
} from "./types.js";
import { getDefaultConfig } from "./types.js";
import { GenericProvider } from "./providers/generic.js";
import { AnthropicProvider } from "./providers/anthropic.js";
import { OllamaProvider } from "./providers/ollama.js";
import { LLMCache } from "./cache.js";
import { getErrorMessage } from "../errors.js";

/**
 * Instantiates the provider client for the configured model and injects its API key.
 */
export function createProvider(
  modelConfig: ModelConfig,
  env: NodeJS.ProcessEnv = process.env,
): LLMProvider {
  switch (modelConfig.provider) {
    case "ollama":
      return new OllamaProvider(
        modelConfig.endpoint,
        modelConfig.model,
        modelConfig.numCtx,
      );
    case "openai":
      if (!env.OPENAI_API_KEY) {
        throw new Error("OPENAI_API_KEY is required for the openai provider");
      }
      return new GenericProvider(
        modelConfig.endpoint,
        modelConfig.model,
        env.OPENAI_API_KEY,
      );
    case "anthropic":
      if (!env.ANTHROPIC_API_KEY) {
        throw new Error(
          "ANTHROPIC_API_KEY is required for the anthropic provider",
        );
      }
      return new AnthropicProvider(
        modelConfig.endpoint,
        modelConfig.model,
        env.ANTHROPIC_API_KEY,
      );
  }
}

export class LLMClient implements ReasoningClient {
  private textProvider: LLMProvider;
  private cache: LLMCache | null;
  private config: LLMConfig;

  constructor(config?: Partial<LLMConfig>, provider?: LLMProvider) {
    this.config = { ...getDefaultConfig(), ...config };

    this.textProvider = provider ?? createProvider(this.config.text);

    this.cache = this.config.cache.enabled
      ? new LLMCache(this.config.cache.dir)
      : null;
  }

  get provider(): ProviderName {
    return this.config.text.provider;
  }

  get model(): string {
    return this.config.text.model;
  }

  /**
   * Sends one user message and returns the raw reply text.
   * Provider failures surface as TransportError; nothing is retried here.
   */
  async invoke(
    prompt: string,
    options: ChatRequestOptions & { maxTokens: number; temperature: number },
  ): Promise<string> {
    const model = options.model || this.config.text.model;
    const prefix = options.cachePrefix || "chat";
    const messages: ChatMessage[] = [{ role: "user", content: prompt }];

    if (this.cache && !options.skipCache) {
      const cached = await this.cache.get(messages, model, prefix);
      if (cached) {
        console.log(`[LLMClient] Cache hit for model ${model} (${prefix})`);
        return cached.content;
      }
    }

    console.log(
      `[LLMClient] Invoking ${this.textProvider.name} model ${model} (prompt ${prompt.length} chars, max_tokens ${options.maxTokens}, temperature ${options.temperature})`,
    );

    const response = await this.textProvider.chat(messages, {
      ...options,
      model,
    });

    console.log(
      `[LLMClient] Reply from ${response.model}: ${response.content.length} chars` +
        (response.usage
          ? ` (${response.usage.promptTokens} in / ${response.usage.completionTokens} out)`
          : ""),
    );

    if (this.cache && !options.skipCache) {
      // Cache write failures never discard the reply
      try {
        await this.cache.set(messages, model, response, prefix);
      } catch (error) {
        console.warn(`[LLMClient] Cache write failed: ${getErrorMessage(error)}`);
      }
    }

    return response.content;
  }
}

export type { ReasoningClient, ChatMessage, ChatResponse } from "./types.js";
