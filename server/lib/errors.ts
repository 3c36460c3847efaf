export type ErrorKind =
  | "input_invalid"
  | "upstream_auth"
  | "rate_limited"
  | "upstream_unavailable"
  | "upstream_error"
  | "provider_unavailable"
  | "analysis_failed"
  | "malformed_output"
  | "signature_invalid"
  | "usage"
  | "misconfigured"
  | "internal";

/**
 * Base for every error the pipeline raises on purpose. `message` is for the
 * server log; `publicMessage` is what a caller may see.
 */
export class TriageError extends Error {
  readonly kind: ErrorKind;
  readonly status: number;
  readonly publicMessage: string;

  constructor(kind: ErrorKind, status: number, message: string, publicMessage: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
    this.status = status;
    this.publicMessage = publicMessage;
  }
}

export class InputValidationError extends TriageError {
  constructor(message: string) {
    super("input_invalid", 400, message, message);
  }
}

export class ConfigurationError extends TriageError {
  constructor(message: string) {
    super("misconfigured", 500, message, "Server is not configured for this request.");
  }
}

export class AuthError extends TriageError {
  constructor(message: string) {
    super(
      "upstream_auth",
      503,
      message,
      "Event tracking authentication failed. Check the server's event-tracking credentials."
    );
  }
}

export class RateLimitError extends TriageError {
  readonly retryAfterSec: number;

  constructor(message: string, retryAfterSec: number) {
    super("rate_limited", 429, message, `Event tracking rate limit exceeded. Try again in ${retryAfterSec} seconds.`);
    this.retryAfterSec = retryAfterSec;
  }
}

export class TransientNetworkError extends TriageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("upstream_unavailable", 502, message, "Event tracking service is unavailable. Try again shortly.", options);
  }
}

export class EventServiceError extends TriageError {
  constructor(message: string) {
    super("upstream_error", 502, message, "Event tracking service returned an error.");
  }
}

export class ProviderUnavailableError extends TriageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("provider_unavailable", 503, message, "AI service is unavailable. Try again in a few moments.", options);
  }
}

export class AnalysisError extends TriageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("analysis_failed", 500, message, "Analysis failed.", options);
  }
}

export class ResponseFormatError extends TriageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("malformed_output", 502, message, "Analysis failed: the AI returned an invalid response.", options);
  }
}

export class SignatureError extends TriageError {
  constructor(message: string) {
    super("signature_invalid", 401, message, "Invalid signature.");
  }
}

export class UsageError extends TriageError {
  readonly hint: string;

  constructor(message: string, hint: string) {
    super("usage", 200, message, message);
    this.hint = hint;
  }
}

export type ErrorBody = {
  error: {
    kind: ErrorKind;
    message: string;
    requestId: string;
    retryAfterSec?: number;
  };
};

export function asMessage(error: unknown): string {
  if (!error) return "";
  if (error instanceof Error) return error.message || "";
  return String(error);
}

export function toTriageError(error: unknown): TriageError {
  if (error instanceof TriageError) return error;
  return new TriageError("internal", 500, asMessage(error) || "Unknown error", "An unexpected error occurred.", {
    cause: error,
  });
}

export function toErrorResponse(error: unknown, requestId: string): { status: number; body: ErrorBody } {
  const e = toTriageError(error);
  return {
    status: e.status,
    body: {
      error: {
        kind: e.kind,
        message: e.publicMessage,
        requestId,
        ...(e instanceof RateLimitError ? { retryAfterSec: e.retryAfterSec } : {}),
      },
    },
  };
}
