export class NotFoundError extends Error {
  constructor(message: string, public code: string = "not_found") {
    super(message);
    this.name = "NotFoundError";
  }
}

export class UnresolvedTargetError extends Error {
  constructor(message: string, public code: string = "target_unresolved") {
    super(message);
    this.name = "UnresolvedTargetError";
  }
}

export class UnauthorizedError extends Error {
  constructor(message: string, public code: string = "unauthorized") {
    super(message);
    this.name = "UnauthorizedError";
  }
}

export class RateLimitError extends Error {
  constructor(message: string, public code: string = "rate_limited") {
    super(message);
    this.name = "RateLimitError";
  }
}

export class MalformedResponseError extends Error {
  constructor(message: string, public code: string = "malformed_response") {
    super(message);
    this.name = "MalformedResponseError";
  }
}

export class ExportTargetMissingError extends Error {
  constructor(message: string = "Nothing to export: load a list or ranking first.", public code: string = "no_collection_available") {
    super(message);
    this.name = "ExportTargetMissingError";
  }
}

export class DataApiError extends Error {
  constructor(message: string, public code: string, public status?: number) {
    super(message);
    this.name = "DataApiError";
  }
}

export class LLMError extends Error {
  constructor(message: string, public code: string) {
    super(message);
    this.name = "LLMError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export type AppError =
  | NotFoundError
  | UnresolvedTargetError
  | UnauthorizedError
  | RateLimitError
  | MalformedResponseError
  | ExportTargetMissingError
  | DataApiError
  | LLMError;

export interface ErrorPayload {
  ok: false;
  error: string;
  message: string;
  hint?: string;
}

export function isAppError(error: unknown): error is AppError {
  return (
    error instanceof NotFoundError ||
    error instanceof UnresolvedTargetError ||
    error instanceof UnauthorizedError ||
    error instanceof RateLimitError ||
    error instanceof MalformedResponseError ||
    error instanceof ExportTargetMissingError ||
    error instanceof DataApiError ||
    error instanceof LLMError
  );
}

/** Non-retryable upstream conditions: retrying cannot change the answer. */
export function isPermanentError(error: unknown): boolean {
  return (
    error instanceof NotFoundError ||
    error instanceof UnauthorizedError ||
    error instanceof RateLimitError ||
    error instanceof MalformedResponseError ||
    error instanceof ConfigError
  );
}

export function toErrorPayload(error: unknown): ErrorPayload {
  if (error instanceof UnauthorizedError) {
    return {
      ok: false,
      error: error.code,
      message: error.message,
      hint: "Check the API credentials in the .env file, then run 'reload'.",
    };
  }
  if (error instanceof RateLimitError) {
    return {
      ok: false,
      error: error.code,
      message: error.message,
      hint: "The data API is throttling requests. Narrow the scope (smaller sample or limit) and try again later.",
    };
  }
  if (error instanceof ConfigError) {
    return { ok: false, error: "config_error", message: error.message };
  }
  if (isAppError(error)) {
    return { ok: false, error: error.code, message: error.message };
  }
  const message = error instanceof Error ? error.message : "Unknown error";
  return { ok: false, error: "unexpected_error", message };
}
