/**
 * Anthropic Messages API provider
 *
 * Reply envelope carries zero or more content blocks; the first block's text is the answer.
 */

import { z } from "zod";
import type {
  ChatMessage,
  ChatRequestOptions,
  ChatResponse,
} from "../types.js";
import { GenericProvider } from "./generic.js";
import { TransportError } from "../../errors.js";

const ANTHROPIC_VERSION = "2023-06-01";

const messagesEnvelopeSchema = z.object({
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
    }),
  ),
  model: z.string().optional(),
  usage: z
    .object({
      input_tokens: z.number(),
      output_tokens: z.number(),
    })
    .optional(),
});

export class AnthropicProvider extends GenericProvider {
  name = "anthropic";

  protected _getRequestBody(
    messages: ChatMessage[],
    options?: ChatRequestOptions,
  ): Record<string, unknown> {
    const model = options?.model || this.defaultModel;

    // System prompts travel outside the message list in this API
    const system = messages
      .filter((message) => message.role === "system")
      .map((message) => message.content)
      .join("\n\n");

    const requestBody: Record<string, unknown> = {
      model,
      messages: messages.filter((message) => message.role !== "system"),
      max_tokens: options?.maxTokens ?? 4000,
      temperature: options?.temperature ?? 0.1,
    };

    if (system) {
      requestBody.system = system;
    }

    return requestBody;
  }

  protected _getRequestHeaders(): Record<string, string> {
    return {
      "Content-Type": "application/json",
      "x-api-key": this.apiKey,
      "anthropic-version": ANTHROPIC_VERSION,
    };
  }

  protected _readEnvelope(data: unknown, model: string): ChatResponse {
    const parsed = messagesEnvelopeSchema.safeParse(data);
    if (!parsed.success) {
      throw new TransportError(
        `${this.name} returned an unexpected response envelope: ${parsed.error.message}`,
      );
    }

    const text = parsed.data.content[0]?.text;
    if (text === undefined) {
      throw new TransportError(
        `No content in ${this.name} response. Full response: ${JSON.stringify(data)}`,
      );
    }

    const usage = parsed.data.usage;
    return {
      content: text,
      model: parsed.data.model || model,
      usage: usage
        ? {
            promptTokens: usage.input_tokens,
            completionTokens: usage.output_tokens,
            totalTokens: usage.input_tokens + usage.output_tokens,
          }
        : undefined,
    };
  }
}
