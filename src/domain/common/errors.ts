export type ErrorKind =
  | "config"
  | "validation"
  | "provider"
  | "backend_unavailable"
  | "store"
  | "io"
  | "unknown";

export class AppError extends Error {
  readonly kind: ErrorKind;
  override readonly cause?: unknown;

  constructor(kind: ErrorKind, message: string, cause?: unknown) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
    this.cause = cause;
  }
}

/** Missing credential or invalid settings. Fatal: halts before any interaction. */
export class ConfigError extends AppError {
  constructor(message: string, cause?: unknown) {
    super("config", message, cause);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, cause?: unknown) {
    super("validation", message, cause);
  }
}

/** A configured backend raised during a call. */
export class ProviderError extends AppError {
  readonly provider?: string;
  readonly statusCode?: number;
  readonly retryable: boolean;

  constructor(params: {
    message: string;
    provider?: string;
    statusCode?: number;
    retryable: boolean;
    cause?: unknown;
  }) {
    super("provider", params.message, params.cause);
    this.provider = params.provider;
    this.statusCode = params.statusCode;
    this.retryable = params.retryable;
  }
}

/** A backend was never constructed (credential present but client setup failed). */
export class BackendUnavailableError extends AppError {
  readonly backend: string;

  constructor(backend: string, reason: string) {
    super("backend_unavailable", `${backend} backend unavailable: ${reason}`);
    this.backend = backend;
  }
}

/** The persistent character store could not be read or written. */
export class StoreUnavailableError extends AppError {
  constructor(message: string, cause?: unknown) {
    super("store", message, cause);
  }
}

export class IOError extends AppError {
  readonly path?: string;

  constructor(message: string, cause?: unknown, path?: string) {
    super("io", message, cause);
    this.path = path;
  }
}

export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) return error;
  if (error instanceof Error)
    return new AppError("unknown", error.message, error);
  return new AppError("unknown", String(error));
}
