/**
 * Ollama through its OpenAI-compatible route, for running validations against a
 * model on the developer's machine.
 */

import type {
  ChatMessage,
  ChatRequestOptions,
  ChatResponse,
} from "../types.js";
import { GenericProvider } from "./generic.js";

const KEEP_ALIVE = "5m";

export class OllamaProvider extends GenericProvider {
  name = "ollama";

  // Settles when the previous request does; requests run one at a time
  private tail: Promise<unknown> = Promise.resolve();

  constructor(
    endpoint: string,
    defaultModel: string,
    private readonly contextWindow: number,
  ) {
    super(endpoint, defaultModel, "");
  }

  /**
   * Same payload as the generic provider, with the context window pinned and
   * `format: "json"` in place of `response_format`, which Ollama does not enforce.
   */
  protected _getRequestBody(
    messages: ChatMessage[],
    options?: ChatRequestOptions,
  ): Record<string, unknown> {
    const body = super._getRequestBody(messages, options);
    delete body.response_format;

    return {
      ...body,
      stream: false,
      keep_alive: KEEP_ALIVE,
      options: { num_ctx: this.contextWindow },
      ...(options?.responseFormat?.type === "json_object"
        ? { format: "json" }
        : {}),
    };
  }

  protected _chat(
    messages: ChatMessage[],
    options?: ChatRequestOptions,
  ): Promise<ChatResponse> {
    const request = this.tail.then(() => this._doChat(messages, options));
    this.tail = Promise.allSettled([request]);
    return request;
  }
}
