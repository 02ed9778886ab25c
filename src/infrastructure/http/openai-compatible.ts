import { z } from "zod";
import { ConfigError, ProviderError } from "../../domain/common/errors";

const ErrorBodySchema = z.object({
  error: z.union([
    z.string(),
    z.object({
      code: z.union([z.number(), z.string()]).optional(),
      message: z.string(),
    }),
  ]),
});

export type OpenAiCompatibleEndpoint = {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
};

export function joinUrl(baseUrl: string, pathname: string): string {
  const base = baseUrl.endsWith("/") ? baseUrl.slice(0, -1) : baseUrl;
  const path = pathname.startsWith("/") ? pathname : `/${pathname}`;
  return `${base}${path}`;
}

export function readErrorMessage(json: unknown): string | undefined {
  const parsed = ErrorBodySchema.safeParse(json);
  if (!parsed.success) return undefined;
  const { error } = parsed.data;
  return typeof error === "string" ? error : error.message;
}

export function assertEndpoint(
  endpoint: OpenAiCompatibleEndpoint,
  label: string,
): void {
  if (endpoint.apiKey.trim() === "") {
    throw new ConfigError(`${label} API key cannot be empty`);
  }
  if (!URL.canParse(endpoint.baseUrl)) {
    throw new ConfigError(
      `${label} base URL is not a valid URL: ${endpoint.baseUrl}`,
    );
  }
  if (endpoint.timeoutMs <= 0) {
    throw new ConfigError(`${label} timeout must be positive`);
  }
}

/**
 * POSTs a JSON body with bearer auth and returns the decoded JSON.
 *
 * HTTP failures, in-band `error` bodies (some gateways answer 200 with an
 * error object), timeouts and network faults all surface as ProviderError;
 * 429, 5xx and network faults are marked retryable.
 */
export async function postJson(params: {
  endpoint: OpenAiCompatibleEndpoint;
  path: string;
  body: unknown;
  provider: string;
  label: string;
}): Promise<unknown> {
  const { endpoint, provider, label } = params;
  const url = joinUrl(endpoint.baseUrl, params.path);
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), endpoint.timeoutMs);

  try {
    const res = await fetch(url, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${endpoint.apiKey}`,
        "Content-Type": "application/json",
        Accept: "application/json",
      },
      body: JSON.stringify(params.body),
      signal: controller.signal,
    });

    const text = await res.text();
    let json: unknown;
    try {
      json = text.length > 0 ? JSON.parse(text) : undefined;
    } catch {
      json = text;
    }
    const bodyError = readErrorMessage(json);

    if (!res.ok) {
      throw new ProviderError({
        provider,
        statusCode: res.status,
        retryable: res.status === 429 || res.status >= 500,
        message: bodyError ?? `${label} request failed (${res.status})`,
        cause: json,
      });
    }

    if (bodyError) {
      throw new ProviderError({
        provider,
        retryable: true,
        message: bodyError,
        cause: json,
      });
    }

    return json;
  } catch (error) {
    if (error instanceof ProviderError) throw error;
    throw new ProviderError({
      provider,
      retryable: true,
      message: controller.signal.aborted
        ? `${label} request timed out after ${endpoint.timeoutMs}ms`
        : `${label} request failed`,
      cause: error,
    });
  } finally {
    clearTimeout(timeout);
  }
}
