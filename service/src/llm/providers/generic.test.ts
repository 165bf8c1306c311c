import { describe, it, expect, vi, beforeEach } from "vitest";
import { GenericProvider } from "./generic.js";
import { OllamaProvider } from "./ollama.js";
import { TransportError } from "../../errors.js";

const mockFetch = vi.fn();
vi.stubGlobal("fetch", mockFetch);

const ENDPOINT = "http://llm.test/v1/chat/completions";

function completion(content: string | null, extra: Record<string, unknown> = {}) {
  return {
    ok: true,
    status: 200,
    json: async () => ({
      choices: [{ message: { content } }],
      ...extra,
    }),
  };
}

describe("GenericProvider", () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it("should post an OpenAI-style payload with bearer auth", async () => {
    mockFetch.mockResolvedValueOnce(completion("{}"));

    const provider = new GenericProvider(ENDPOINT, "gpt-test", "test-secret");
    await provider.chat([{ role: "user", content: "hi" }], {
      maxTokens: 100,
      temperature: 0.2,
      responseFormat: { type: "json_object" },
    });

    const [url, options] = mockFetch.mock.calls[0];
    expect(url).toBe(ENDPOINT);
    expect(options.method).toBe("POST");
    expect(options.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-secret",
    });
    expect(JSON.parse(options.body)).toEqual({
      model: "gpt-test",
      messages: [{ role: "user", content: "hi" }],
      temperature: 0.2,
      max_tokens: 100,
      response_format: { type: "json_object" },
    });
  });

  it("should omit the authorization header without a key", async () => {
    mockFetch.mockResolvedValueOnce(completion("ok"));

    const provider = new GenericProvider(ENDPOINT, "gpt-test", "");
    await provider.chat([{ role: "user", content: "hi" }]);

    const [, options] = mockFetch.mock.calls[0];
    expect(options.headers).toEqual({ "Content-Type": "application/json" });
    expect(JSON.parse(options.body)).toEqual({
      model: "gpt-test",
      messages: [{ role: "user", content: "hi" }],
      temperature: 0.1,
      max_tokens: 4000,
    });
  });

  it("should read content, model and usage from the envelope", async () => {
    mockFetch.mockResolvedValueOnce(
      completion("answer", {
        model: "gpt-test-0613",
        usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
      }),
    );

    const provider = new GenericProvider(ENDPOINT, "gpt-test", "test-secret");
    const response = await provider.chat([{ role: "user", content: "hi" }]);

    expect(response).toEqual({
      content: "answer",
      model: "gpt-test-0613",
      usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
    });
  });

  it("should raise TransportError on non-2xx responses", async () => {
    mockFetch.mockResolvedValueOnce({
      ok: false,
      status: 401,
      text: async () => "invalid api key",
    });

    const provider = new GenericProvider(ENDPOINT, "gpt-test", "test-secret");
    const promise = provider.chat([{ role: "user", content: "hi" }]);

    await expect(promise).rejects.toThrow(TransportError);
    await expect(promise).rejects.toThrow("openai API error (401): invalid api key");
  });

  it("should raise TransportError when the request itself fails", async () => {
    mockFetch.mockRejectedValueOnce(new Error("ECONNREFUSED"));

    const provider = new GenericProvider(ENDPOINT, "gpt-test", "test-secret");

    await expect(
      provider.chat([{ role: "user", content: "hi" }]),
    ).rejects.toThrow("openai request failed: ECONNREFUSED");
  });

  it("should raise TransportError when the reply has no content", async () => {
    mockFetch.mockResolvedValueOnce(completion(null));

    const provider = new GenericProvider(ENDPOINT, "gpt-test", "test-secret");

    await expect(
      provider.chat([{ role: "user", content: "hi" }]),
    ).rejects.toThrow("No content in openai response");
  });

  it("should raise TransportError on an unexpected envelope", async () => {
    mockFetch.mockResolvedValueOnce({
      ok: true,
      status: 200,
      json: async () => ({ result: "nope" }),
    });

    const provider = new GenericProvider(ENDPOINT, "gpt-test", "test-secret");

    await expect(
      provider.chat([{ role: "user", content: "hi" }]),
    ).rejects.toThrow(/openai returned an unexpected response envelope/);
  });
});

describe("OllamaProvider", () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it("should add num_ctx and the json format switch", async () => {
    mockFetch.mockResolvedValueOnce(completion("{}"));

    const provider = new OllamaProvider(ENDPOINT, "llama-test", 4096);
    await provider.chat([{ role: "user", content: "hi" }], {
      responseFormat: { type: "json_object" },
    });

    const [, options] = mockFetch.mock.calls[0];
    expect(options.headers).toEqual({ "Content-Type": "application/json" });
    expect(JSON.parse(options.body)).toEqual({
      model: "llama-test",
      messages: [{ role: "user", content: "hi" }],
      temperature: 0.1,
      max_tokens: 4000,
      stream: false,
      keep_alive: "5m",
      options: { num_ctx: 4096 },
      format: "json",
    });
  });

  it("should leave the reply format free unless JSON is requested", async () => {
    mockFetch.mockResolvedValueOnce(completion("plain"));

    const provider = new OllamaProvider(ENDPOINT, "llama-test", 2048);
    await provider.chat([{ role: "user", content: "hi" }], { model: "llama-other" });

    const [, options] = mockFetch.mock.calls[0];
    const body = JSON.parse(options.body);
    expect(body).not.toHaveProperty("format");
    expect(body).not.toHaveProperty("response_format");
    expect(body.model).toBe("llama-other");
    expect(body.options).toEqual({ num_ctx: 2048 });
  });

  it("should never have two requests in flight", async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    mockFetch.mockImplementation(async () => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight--;
      return completion("ok");
    });

    const provider = new OllamaProvider(ENDPOINT, "llama-test", 4096);
    const results = await Promise.all([
      provider.chat([{ role: "user", content: "a" }]),
      provider.chat([{ role: "user", content: "b" }]),
      provider.chat([{ role: "user", content: "c" }]),
    ]);

    expect(results.map((r) => r.content)).toEqual(["ok", "ok", "ok"]);
    expect(mockFetch).toHaveBeenCalledTimes(3);
    expect(maxInFlight).toBe(1);
  });

  it("should keep serving after a failed request", async () => {
    mockFetch
      .mockResolvedValueOnce({
        ok: false,
        status: 500,
        text: async () => "model not loaded",
      })
      .mockResolvedValueOnce(completion("recovered"));

    const provider = new OllamaProvider(ENDPOINT, "llama-test", 4096);

    await expect(
      provider.chat([{ role: "user", content: "a" }]),
    ).rejects.toThrow("ollama API error (500): model not loaded");
    const response = await provider.chat([{ role: "user", content: "b" }]);
    expect(response.content).toBe("recovered");
  });
});
