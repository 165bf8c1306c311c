/**
 * LLM Provider Types
 *
 * Abstractions for the reasoning service providers (Anthropic, OpenAI-compatible, Ollama).
 */

import { tmpdir } from "os";
import { join } from "path";

/**
 * Chat message format (role-tagged)
 */
export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

/**
 * Chat request options
 */
export interface ChatRequestOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  /** Skip cache lookup/write for this request */
  skipCache?: boolean;
  /** Cache folder prefix (e.g. "validate", "validate-single") */
  cachePrefix?: string;
  /** Ask providers that support it for a bare JSON object reply */
  responseFormat?: {
    type: "json_object";
  };
}

/**
 * Chat response
 */
export interface ChatResponse {
  content: string;
  model: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
  cached?: boolean;
}

/**
 * LLM Provider interface
 */
export interface LLMProvider {
  name: string;

  chat(
    messages: ChatMessage[],
    options?: ChatRequestOptions,
  ): Promise<ChatResponse>;
}

export const PROVIDER_NAMES = ["anthropic", "openai", "ollama"] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

export function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some((name) => name === value);
}

/**
 * Reasoning model configuration
 */
export interface ModelConfig {
  provider: ProviderName;
  endpoint: string;
  model: string;
  numCtx: number;
  maxTokens: number;
  temperature: number;
}

/**
 * Global LLM configuration
 */
export interface LLMConfig {
  cache: {
    enabled: boolean;
    dir: string;
  };
  text: ModelConfig;
}

const DEFAULT_MODELS: Record<ProviderName, string> = {
  anthropic: "claude-3-7-sonnet-20250219",
  openai: "gpt-4o",
  ollama: "llama3.1",
};

const DEFAULT_ENDPOINTS: Record<ProviderName, string> = {
  anthropic: "https://api.anthropic.com/v1/messages",
  openai: "https://api.openai.com/v1/chat/completions",
  ollama: "http://localhost:11434/v1/chat/completions",
};

/**
 * Get default configuration from environment
 */
export function getDefaultConfig(
  env: NodeJS.ProcessEnv = process.env,
): LLMConfig {
  const providerName = env.LLM_PROVIDER || "anthropic";
  if (!isProviderName(providerName)) {
    throw new Error(
      `Unsupported LLM_PROVIDER "${providerName}" (expected one of: ${PROVIDER_NAMES.join(", ")})`,
    );
  }

  const temperature = parseFloat(env.LLM_TEMPERATURE || "0.1");
  const maxTokens = parseInt(env.LLM_MAX_TOKENS || "4000", 10);

  return {
    cache: {
      enabled: env.LLM_CACHE_ENABLED === "true",
      dir: env.LLM_CACHE_DIR || join(tmpdir(), "claim-validator-llm-cache"),
    },
    text: {
      provider: providerName,
      endpoint: env.LLM_ENDPOINT || DEFAULT_ENDPOINTS[providerName],
      model: env.LLM_MODEL || DEFAULT_MODELS[providerName],
      numCtx: parseInt(env.LLM_NUM_CTX || "8192", 10),
      maxTokens: Number.isNaN(maxTokens) ? 4000 : maxTokens,
      temperature: Number.isNaN(temperature) ? 0.1 : temperature,
    },
  };
}

/**
 * Single-shot text-in/text-out access to the reasoning service.
 * Implementations do not retry and do not stream.
 */
export interface ReasoningClient {
  readonly provider: ProviderName;
  readonly model: string;

  invoke(
    prompt: string,
    options: ChatRequestOptions & { maxTokens: number; temperature: number },
  ): Promise<string>;
}
