import { toAppError } from "../../../domain/common/errors";
import type { Logger } from "../../logging/logger";
import type {
  ChatCompletionRequest,
  ChatCompletionResponse,
  LlmClient,
} from "../types";
import { withRetry, type RetryConfig } from "./retry";

/** Decorates an LlmClient so transient provider failures are retried with backoff. */
export class RetriableClient implements LlmClient {
  readonly provider: LlmClient["provider"];
  private readonly inner: LlmClient;
  private readonly retry: RetryConfig;

  constructor(inner: LlmClient, retry: RetryConfig, logger?: Logger) {
    this.inner = inner;
    this.provider = inner.provider;
    this.retry = {
      ...retry,
      onRetry: (attempt, error, waitMs) => {
        logger?.warn(
          `${inner.provider} chat attempt ${attempt} failed (${toAppError(error).message}); retrying in ${waitMs}ms`,
        );
        retry.onRetry?.(attempt, error, waitMs);
      },
    };
  }

  async chatComplete(
    request: ChatCompletionRequest,
  ): Promise<ChatCompletionResponse> {
    return withRetry(() => this.inner.chatComplete(request), this.retry);
  }
}
