export { createBackends, type Backends } from "./factory";
export { NvidiaClient, type NvidiaClientConfig } from "./providers/nvidia";
export { withRetry, computeBackoffMs, type RetryConfig } from "./retry/retry";
export { RetriableClient } from "./retry/retriable-client";
export type {
  ChatMessage,
  ChatRole,
  ChatCompletionRequest,
  ChatCompletionResponse,
  LlmClient,
  ProviderName,
} from "./types";
