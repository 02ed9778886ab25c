import { toAppError } from "../../domain/common/errors";
import type { AppConfig } from "../config/schema";
import { ready, unavailable, type Backend } from "../backend";
import { NvidiaEmbeddings } from "../embeddings/nvidia";
import type { EmbeddingsBackend } from "../embeddings/types";
import type { Logger } from "../logging/logger";
import { silentLogger } from "../logging/logger";
import { NvidiaClient } from "./providers/nvidia";
import { RetriableClient } from "./retry/retriable-client";
import type { LlmClient } from "./types";

export type Backends = {
  generation: Backend<LlmClient>;
  embeddings: Backend<EmbeddingsBackend>;
};

function construct<T>(name: string, build: () => T, logger: Logger): Backend<T> {
  try {
    return ready(build());
  } catch (error) {
    const reason = toAppError(error).message;
    logger.error(`Failed to initialise ${name} backend: ${reason}`);
    return unavailable(reason);
  }
}

export function createBackends(
  config: AppConfig,
  logger: Logger = silentLogger,
): Backends {
  const nvidia = config.providers.nvidia;

  const generation = construct<LlmClient>(
    "generation",
    () =>
      new RetriableClient(
        new NvidiaClient({
          apiKey: nvidia.apiKey,
          baseUrl: nvidia.baseUrl,
          timeoutMs: nvidia.timeoutMs,
        }),
        {
          maxRetries: nvidia.maxRetries,
          backoff: { baseMs: 250, maxMs: 10_000, jitter: 0.2 },
        },
        logger,
      ),
    logger,
  );

  const embeddings = construct<EmbeddingsBackend>(
    "embedding",
    () =>
      new NvidiaEmbeddings({
        apiKey: nvidia.apiKey,
        baseUrl: nvidia.baseUrl,
        timeoutMs: nvidia.timeoutMs,
        model: config.embeddings.model,
      }),
    logger,
  );

  return { generation, embeddings };
}
