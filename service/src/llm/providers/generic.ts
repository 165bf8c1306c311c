/**
 * OpenAI-compatible chat completions provider
 *
 * Works with any endpoint speaking the `/v1/chat/completions` dialect
 * (OpenAI, Azure-style gateways, vLLM, LiteLLM proxies).
 */

import { z } from "zod";
import type {
  LLMProvider,
  ChatMessage,
  ChatRequestOptions,
  ChatResponse,
} from "../types.js";
import { TransportError, getErrorMessage } from "../../errors.js";

const chatCompletionEnvelopeSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullable().optional(),
      }),
    }),
  ),
  model: z.string().optional(),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional(),
});

export class GenericProvider implements LLMProvider {
  name = "openai";

  constructor(
    protected endpoint: string,
    protected defaultModel: string,
    protected apiKey: string,
  ) {}

  async chat(
    messages: ChatMessage[],
    options?: ChatRequestOptions,
  ): Promise<ChatResponse> {
    return this._chat(messages, options);
  }

  protected _getRequestBody(
    messages: ChatMessage[],
    options?: ChatRequestOptions,
  ): Record<string, unknown> {
    const model = options?.model || this.defaultModel;

    const requestBody: Record<string, unknown> = {
      model,
      messages,
      temperature: options?.temperature ?? 0.1,
      max_tokens: options?.maxTokens ?? 4000,
    };

    if (options?.responseFormat) {
      requestBody.response_format = options.responseFormat;
    }

    return requestBody;
  }

  protected _getRequestHeaders(): Record<string, string> {
    const requestHeaders: Record<string, string> = {
      "Content-Type": "application/json",
    };

    if (this.apiKey) {
      requestHeaders["Authorization"] = `Bearer ${this.apiKey}`;
    }

    return requestHeaders;
  }

  /**
   * Maps the decoded reply envelope to a ChatResponse.
   * Throws TransportError when the envelope has no text to read.
   */
  protected _readEnvelope(data: unknown, model: string): ChatResponse {
    const parsed = chatCompletionEnvelopeSchema.safeParse(data);
    if (!parsed.success) {
      throw new TransportError(
        `${this.name} returned an unexpected response envelope: ${parsed.error.message}`,
      );
    }

    const content = parsed.data.choices[0]?.message.content;
    if (!content) {
      throw new TransportError(`No content in ${this.name} response`);
    }

    const usage = parsed.data.usage;
    return {
      content,
      model: parsed.data.model || model,
      usage: usage
        ? {
            promptTokens: usage.prompt_tokens,
            completionTokens: usage.completion_tokens,
            totalTokens: usage.total_tokens,
          }
        : undefined,
    };
  }

  protected async _chat(
    messages: ChatMessage[],
    options?: ChatRequestOptions,
  ): Promise<ChatResponse> {
    return this._doChat(messages, options);
  }

  protected async _doChat(
    messages: ChatMessage[],
    options?: ChatRequestOptions,
  ): Promise<ChatResponse> {
    const model = options?.model || this.defaultModel;

    const requestBody = this._getRequestBody(messages, options);
    const requestHeaders = this._getRequestHeaders();

    let response: Response;
    try {
      response = await fetch(this.endpoint, {
        method: "POST",
        headers: requestHeaders,
        body: JSON.stringify(requestBody),
      });
    } catch (error) {
      throw new TransportError(
        `${this.name} request failed: ${getErrorMessage(error)}`,
        { cause: error },
      );
    }

    if (!response.ok) {
      const error = await response.text();
      throw new TransportError(
        `${this.name} API error (${response.status}): ${error}`,
      );
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (error) {
      throw new TransportError(
        `Failed to decode ${this.name} response as JSON: ${getErrorMessage(error)}`,
        { cause: error },
      );
    }

    return this._readEnvelope(data, model);
  }
}
