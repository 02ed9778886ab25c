import { z } from "zod";
import { ProviderError } from "../../../domain/common/errors";
import {
  assertEndpoint,
  postJson,
  type OpenAiCompatibleEndpoint,
} from "../../http/openai-compatible";
import type {
  ChatCompletionRequest,
  ChatCompletionResponse,
  ChatMessage,
  LlmClient,
} from "../types";

const ChatCompletionBodySchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z
          .object({ role: z.string().optional(), content: z.string().nullish() })
          .optional(),
        finish_reason: z.string().nullish(),
      }),
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional(),
    })
    .optional(),
});

export type NvidiaClientConfig = OpenAiCompatibleEndpoint;

type NvidiaChatCompletionBody = {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  top_p?: number;
  max_tokens?: number;
  stream: false;
};

/**
 * Chat completions against NVIDIA's hosted, OpenAI-compatible endpoint
 * (`POST {baseUrl}/chat/completions`).
 */
export class NvidiaClient implements LlmClient {
  readonly provider = "nvidia" as const;
  private readonly endpoint: OpenAiCompatibleEndpoint;

  constructor(config: NvidiaClientConfig) {
    assertEndpoint(config, "NVIDIA");
    this.endpoint = config;
  }

  async chatComplete(
    request: ChatCompletionRequest,
  ): Promise<ChatCompletionResponse> {
    const body: NvidiaChatCompletionBody = {
      model: request.model,
      messages: request.messages,
      temperature: request.temperature,
      top_p: request.topP,
      max_tokens: request.maxTokens,
      stream: false,
    };

    const json = await postJson({
      endpoint: this.endpoint,
      path: "/chat/completions",
      body,
      provider: this.provider,
      label: "NVIDIA",
    });

    const completion = ChatCompletionBodySchema.safeParse(json);
    if (!completion.success) {
      throw new ProviderError({
        provider: this.provider,
        retryable: false,
        message: "NVIDIA chat response has no choices",
        cause: json,
      });
    }

    const choice = completion.data.choices[0];
    const usage = completion.data.usage;
    return {
      provider: this.provider,
      model: completion.data.model ?? request.model,
      content: choice?.message?.content ?? "",
      finishReason: choice?.finish_reason ?? undefined,
      usage: usage
        ? {
            promptTokens: usage.prompt_tokens,
            completionTokens: usage.completion_tokens,
            totalTokens: usage.total_tokens,
          }
        : undefined,
    };
  }
}
