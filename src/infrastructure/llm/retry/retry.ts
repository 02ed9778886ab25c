import { ProviderError } from "../../../domain/common/errors";

export type BackoffConfig = {
  baseMs: number;
  maxMs: number;
  jitter: number;
};

export type RetryConfig = {
  maxRetries: number;
  backoff: BackoffConfig;
  onRetry?: (attempt: number, error: unknown, waitMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
};

export function computeBackoffMs(
  attempt: number,
  config: BackoffConfig,
  random: () => number = Math.random,
): number {
  const exp = config.baseMs * 2 ** Math.max(0, attempt - 1);
  const capped = Math.min(exp, config.maxMs);
  const jitter = 1 + (random() * 2 - 1) * config.jitter;
  return Math.max(0, Math.round(capped * jitter));
}

export async function sleep(ms: number): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, ms));
}

/** Only provider errors flagged retryable are retried (429, 5xx, network). */
export function isRetryable(error: unknown): boolean {
  return error instanceof ProviderError && error.retryable;
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig,
): Promise<T> {
  const wait = config.sleep ?? sleep;
  let lastError: unknown;
  for (let attempt = 1; attempt <= config.maxRetries + 1; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (!isRetryable(error) || attempt > config.maxRetries) break;
      const waitMs = computeBackoffMs(attempt, config.backoff);
      config.onRetry?.(attempt, error, waitMs);
      await wait(waitMs);
    }
  }
  throw lastError;
}
