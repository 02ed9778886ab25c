import { z } from "zod";
import { ProviderError } from "../../domain/common/errors";
import {
  assertEndpoint,
  postJson,
  type OpenAiCompatibleEndpoint,
} from "../http/openai-compatible";
import type { EmbeddingsBackend } from "./types";

const MAX_INPUT_CHARS = 8000;

const EmbeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int().min(0).optional(),
      embedding: z.union([z.array(z.number()), z.string()]),
    }),
  ),
  model: z.string().optional(),
});

export type NvidiaEmbeddingsConfig = OpenAiCompatibleEndpoint & {
  model: string;
};

/**
 * `POST {baseUrl}/embeddings` for NVIDIA retrieval embedding models.
 * Texts are embedded as passages, so stored descriptions and queries share
 * one vector space.
 */
export class NvidiaEmbeddings implements EmbeddingsBackend {
  readonly model: string;
  private readonly endpoint: OpenAiCompatibleEndpoint;

  constructor(config: NvidiaEmbeddingsConfig) {
    assertEndpoint(config, "NVIDIA embeddings");
    this.endpoint = {
      apiKey: config.apiKey,
      baseUrl: config.baseUrl,
      timeoutMs: config.timeoutMs,
    };
    this.model = config.model;
  }

  async embedDocuments(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    const input = texts.map((t) => t.slice(0, MAX_INPUT_CHARS));

    const json = await postJson({
      endpoint: this.endpoint,
      path: "/embeddings",
      body: {
        model: this.model,
        input,
        input_type: "passage",
        encoding_format: "float",
      },
      provider: "nvidia",
      label: "NVIDIA embeddings",
    });

    const parsed = EmbeddingResponseSchema.safeParse(json);
    if (!parsed.success || parsed.data.data.length !== input.length) {
      throw new ProviderError({
        provider: "nvidia",
        retryable: false,
        message: "NVIDIA embeddings response is missing data",
        cause: json,
      });
    }

    const ordered = [...parsed.data.data].sort(
      (a, b) => (a.index ?? 0) - (b.index ?? 0),
    );
    return ordered.map((d) => {
      if (typeof d.embedding === "string") {
        throw new ProviderError({
          provider: "nvidia",
          retryable: false,
          message: "Base64 embeddings are not supported",
        });
      }
      return d.embedding;
    });
  }
}
