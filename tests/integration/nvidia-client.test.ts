import nock from "nock";
import { describe, expect, it } from "vitest";
import { ConfigError, ProviderError } from "../../src/domain/common/errors";
import { NvidiaEmbeddings } from "../../src/infrastructure/embeddings/nvidia";
import { createBackends } from "../../src/infrastructure/llm";
import { NvidiaClient } from "../../src/infrastructure/llm/providers/nvidia";
import type { ChatCompletionRequest } from "../../src/infrastructure/llm/types";
import { testConfig } from "../fakes/context";

const ORIGIN = "https://integrate.api.nvidia.com";
const endpoint = {
  apiKey: "test-key",
  baseUrl: `${ORIGIN}/v1`,
  timeoutMs: 5_000,
};

const request: ChatCompletionRequest = {
  model: "meta/llama-3.1-8b-instruct",
  messages: [{ role: "user", content: "Write Scene 1" }],
  temperature: 0.7,
  topP: 0.9,
  maxTokens: 200,
};

function completion(content: string) {
  return {
    model: "meta/llama-3.1-8b-instruct",
    choices: [{ message: { role: "assistant", content }, finish_reason: "stop" }],
    usage: { prompt_tokens: 12, completion_tokens: 4, total_tokens: 16 },
  };
}

describe("NvidiaClient", () => {
  it("sends an OpenAI-style body and maps the response", async () => {
    const scope = nock(ORIGIN, {
      reqheaders: { authorization: "Bearer test-key" },
    })
      .post(
        "/v1/chat/completions",
        (body) =>
          body.model === "meta/llama-3.1-8b-instruct" &&
          body.temperature === 0.7 &&
          body.top_p === 0.9 &&
          body.max_tokens === 200 &&
          body.stream === false &&
          Object.keys(body).sort().join(",") ===
            "max_tokens,messages,model,stream,temperature,top_p",
      )
      .reply(200, completion("Once upon a time"));

    const res = await new NvidiaClient(endpoint).chatComplete(request);

    expect(res).toEqual({
      provider: "nvidia",
      model: "meta/llama-3.1-8b-instruct",
      content: "Once upon a time",
      finishReason: "stop",
      usage: { promptTokens: 12, completionTokens: 4, totalTokens: 16 },
    });
    expect(scope.isDone()).toBe(true);
  });

  it("marks server errors as retryable", async () => {
    nock(ORIGIN).post("/v1/chat/completions").reply(503, { error: { message: "overloaded" } });

    const error = await new NvidiaClient(endpoint).chatComplete(request).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({ message: "overloaded", statusCode: 503, retryable: true });
  });

  it("does not retry authentication failures", async () => {
    nock(ORIGIN).post("/v1/chat/completions").reply(401, "");

    await expect(new NvidiaClient(endpoint).chatComplete(request)).rejects.toMatchObject({
      message: "NVIDIA request failed (401)",
      retryable: false,
    });
  });

  it("surfaces an error object returned with status 200", async () => {
    nock(ORIGIN).post("/v1/chat/completions").reply(200, { error: "quota exceeded" });

    await expect(new NvidiaClient(endpoint).chatComplete(request)).rejects.toThrow(
      "quota exceeded",
    );
  });

  it("rejects a response without choices", async () => {
    nock(ORIGIN).post("/v1/chat/completions").reply(200, { choices: [] });

    await expect(new NvidiaClient(endpoint).chatComplete(request)).rejects.toThrow(
      "NVIDIA chat response has no choices",
    );
  });

  it("refuses an empty key or malformed base URL", () => {
    expect(() => new NvidiaClient({ ...endpoint, apiKey: " " })).toThrow(ConfigError);
    expect(() => new NvidiaClient({ ...endpoint, baseUrl: "not a url" })).toThrow(
      "NVIDIA base URL is not a valid URL: not a url",
    );
  });
});

describe("NvidiaEmbeddings", () => {
  it("embeds passages and restores input order", async () => {
    nock(ORIGIN)
      .post(
        "/v1/embeddings",
        (body) =>
          body.model === "nvidia/nv-embed-v1" &&
          body.input_type === "passage" &&
          body.encoding_format === "float",
      )
      .reply(200, {
        data: [
          { index: 1, embedding: [0, 1] },
          { index: 0, embedding: [1, 0] },
        ],
      });

    const embeddings = new NvidiaEmbeddings({ ...endpoint, model: "nvidia/nv-embed-v1" });

    expect(await embeddings.embedDocuments(["a knight", "a dragon"])).toEqual([
      [1, 0],
      [0, 1],
    ]);
  });

  it("makes no call for an empty batch", async () => {
    const embeddings = new NvidiaEmbeddings({ ...endpoint, model: "nvidia/nv-embed-v1" });
    expect(await embeddings.embedDocuments([])).toEqual([]);
  });

  it("rejects a response with the wrong number of vectors", async () => {
    nock(ORIGIN).post("/v1/embeddings").reply(200, { data: [] });

    const embeddings = new NvidiaEmbeddings({ ...endpoint, model: "nvidia/nv-embed-v1" });

    await expect(embeddings.embedDocuments(["a"])).rejects.toThrow(
      "NVIDIA embeddings response is missing data",
    );
  });
});

describe("createBackends", () => {
  it("retries a transient generation failure", async () => {
    nock(ORIGIN)
      .post("/v1/chat/completions")
      .reply(502, "")
      .post("/v1/chat/completions")
      .reply(200, completion("Second try"));

    const { generation } = createBackends(testConfig());
    if (generation.status !== "ready") throw new Error(generation.reason);

    const res = await generation.client.chatComplete(request);

    expect(res.content).toBe("Second try");
  });

  it("reports an unusable endpoint as unavailable instead of throwing", () => {
    const config = testConfig();
    config.providers.nvidia.baseUrl = "::";

    const backends = createBackends(config);

    expect(backends.generation).toEqual({
      status: "unavailable",
      reason: "NVIDIA base URL is not a valid URL: ::",
    });
    expect(backends.embeddings.status).toBe("unavailable");
  });
});
