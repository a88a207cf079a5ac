// Error taxonomy shared by the converter, pipeline, cache and batch layers

export type ErrorKind =
  | "validation_error"
  | "transport_error"
  | "stream_interrupted"
  | "cache_error"
  | "tool_loop_limit"
  | "cancelled"
  | "timeout"
  | "internal_error";

export type ClientErrorType =
  | "invalid_request_error"
  | "authentication_error"
  | "permission_error"
  | "not_found_error"
  | "rate_limit_error"
  | "api_error";

export type ClientErrorBody = {
  type: "error";
  error: { type: ClientErrorType; message: string };
};

export class GatewayError extends Error {
  readonly kind: ErrorKind;
  readonly statusCode: number;

  constructor(kind: ErrorKind, statusCode: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
    this.statusCode = statusCode;
  }
}

/** Malformed or schema-invalid input, detected before any transport call. Never retried. */
export class ValidationError extends GatewayError {
  readonly issues: string[];

  constructor(issues: string[] | string) {
    const list = Array.isArray(issues) ? issues : [issues];
    super("validation_error", 400, list.join("; "));
    this.issues = list;
  }
}

/** The upstream call failed. `upstreamStatus` is 0 when no HTTP response was received. */
export class TransportError extends GatewayError {
  readonly upstreamStatus: number;

  constructor(upstreamStatus: number, message: string, options?: { cause?: unknown }) {
    super("transport_error", upstreamStatus >= 400 && upstreamStatus < 500 ? upstreamStatus : 502, message, options);
    this.upstreamStatus = upstreamStatus;
  }
}

/** The provider stream broke after output had started; partial output was already flushed. */
export class StreamInterruptedError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("stream_interrupted", 502, message, options);
  }
}

/** The cache backend is unavailable. Always absorbed by the Response Cache. */
export class CacheError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("cache_error", 500, message, options);
  }
}

export class ToolLoopLimitError extends GatewayError {
  constructor(rounds: number) {
    super("tool_loop_limit", 500, `Tool continuation stopped after ${rounds} rounds`);
  }
}

export class CancelledError extends GatewayError {
  constructor(message = "Request cancelled") {
    super("cancelled", 499, message);
  }
}

export class DeadlineError extends GatewayError {
  constructor(ms: number) {
    super("timeout", 504, `Timed out after ${ms}ms`);
  }
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError");
}

/** Kind of any thrown value, for places that record rather than rethrow (batch results, logs). */
export function errorKind(err: unknown): ErrorKind {
  if (err instanceof GatewayError) return err.kind;
  if (isAbortError(err)) return "cancelled";
  return "internal_error";
}

export function clientTypeForStatus(status: number): ClientErrorType {
  switch (status) {
    case 400:
    case 413:
    case 422:
      return "invalid_request_error";
    case 401:
      return "authentication_error";
    case 403:
      return "permission_error";
    case 404:
      return "not_found_error";
    case 429:
      return "rate_limit_error";
    default:
      return "api_error";
  }
}

/**
 * Render any error in the client wire error shape.
 * Messages of non-gateway errors and upstream bodies are not exposed.
 */
export function toClientError(err: unknown): { status: number; body: ClientErrorBody } {
  if (err instanceof ValidationError) {
    return {
      status: 400,
      body: { type: "error", error: { type: "invalid_request_error", message: err.message } },
    };
  }
  if (err instanceof TransportError) {
    const message = err.upstreamStatus
      ? `Upstream provider returned HTTP ${err.upstreamStatus}`
      : "Upstream provider could not be reached";
    return {
      status: err.statusCode,
      body: { type: "error", error: { type: clientTypeForStatus(err.upstreamStatus), message } },
    };
  }
  if (err instanceof GatewayError) {
    return {
      status: err.statusCode,
      body: { type: "error", error: { type: clientTypeForStatus(err.statusCode), message: err.message } },
    };
  }
  return {
    status: 500,
    body: { type: "error", error: { type: "api_error", message: "Internal gateway error" } },
  };
}
