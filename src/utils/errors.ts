import { ZodError } from "zod";
import { ProviderError } from "../adapters/llm/errors.js";

/**
 * Raised by the circuit breaker while OPEN (or while a HALF_OPEN trial is
 * in flight). The guarded operation was not invoked.
 */
export class BreakerOpenError extends Error {
  readonly name = "BreakerOpenError";

  constructor(
    public readonly breaker: string,
    public readonly retryAfterMs: number
  ) {
    super(`Circuit breaker '${breaker}' is open; retry in ${retryAfterMs}ms`);
  }
}

/**
 * Aggregated text was not a JSON object.
 */
export class ParseError extends Error {
  readonly name: string = "ParseError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * Well-formed JSON object without the mandatory `response` field.
 */
export class SchemaFieldMissingError extends ParseError {
  readonly name = "SchemaFieldMissingError";

  constructor(public readonly field: string) {
    super(`JSON doesn't contain '${field}' field`);
  }
}

/**
 * Complete payload failing its mode schema. Advisory only: never propagated
 * out of the orchestrator.
 */
export class ValidationError extends Error {
  readonly name = "ValidationError";

  constructor(public readonly errors: string[]) {
    super(`Structured response failed validation: ${errors.join("; ")}`);
  }
}

/**
 * Fatal generation failure (breaker open or provider error), as seen by
 * callers of the orchestrator.
 */
export class GenerationFailedError extends Error {
  readonly name = "GenerationFailedError";

  constructor(message: string, options: { cause: unknown }) {
    super(message, options);
  }

  get breakerOpen(): boolean {
    return this.cause instanceof BreakerOpenError;
  }
}

/**
 * Error codes for structured error responses
 */
export type ErrorCode = "BAD_INPUT" | "UPSTREAM_UNAVAILABLE" | "UPSTREAM_ERROR" | "INTERNAL";

/**
 * Structured error response (error.v1 schema)
 */
export interface ErrorV1 {
  schema: "error.v1";
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  request_id?: string;
}

/**
 * Build a structured error response
 */
export function buildErrorV1(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  requestId?: string
): ErrorV1 {
  const error: ErrorV1 = {
    schema: "error.v1",
    code,
    message,
  };

  if (details && Object.keys(details).length > 0) {
    error.details = details;
  }

  if (requestId) {
    error.request_id = requestId;
  }

  return error;
}

/**
 * Remove file paths and secrets from an error message before it leaves the
 * process.
 */
export function sanitizeErrorMessage(message: string): string {
  return message
    .replace(/\/[\w/.@-]+/g, "[path]")
    .replace(/[A-Z_]+_?KEY=\S+/gi, "[KEY_REDACTED]")
    .replace(/sk-[A-Za-z0-9_-]{8,}/g, "[KEY_REDACTED]");
}

/**
 * Human-readable text for a failed generation, as delivered to the end user.
 */
export function describeGenerationFailure(error: unknown): string {
  if (error instanceof GenerationFailedError && error.breakerOpen) {
    return "The assistant is temporarily unavailable. Please try again in a minute.";
  }
  if (error instanceof Error) {
    return sanitizeErrorMessage(error.message || "An unexpected error occurred");
  }
  return "An unexpected error occurred";
}

/**
 * Convert any error to ErrorV1 (safe, never leaks stack/PII)
 */
export function toErrorV1(error: unknown, requestId?: string): ErrorV1 {
  if (error instanceof ZodError) {
    return buildErrorV1(
      "BAD_INPUT",
      "Validation failed",
      { validation_errors: error.flatten() },
      requestId
    );
  }

  if (error instanceof GenerationFailedError) {
    if (error.cause instanceof BreakerOpenError) {
      return buildErrorV1(
        "UPSTREAM_UNAVAILABLE",
        describeGenerationFailure(error),
        { retry_after_ms: error.cause.retryAfterMs },
        requestId
      );
    }
    const details =
      error.cause instanceof ProviderError ? { provider: error.cause.provider } : undefined;
    return buildErrorV1("UPSTREAM_ERROR", describeGenerationFailure(error), details, requestId);
  }

  return buildErrorV1("INTERNAL", describeGenerationFailure(error), undefined, requestId);
}

/**
 * Get HTTP status code for error code
 */
export function getStatusCodeForErrorCode(code: ErrorCode): number {
  switch (code) {
    case "BAD_INPUT":
      return 400;
    case "UPSTREAM_UNAVAILABLE":
      return 503;
    case "UPSTREAM_ERROR":
      return 502;
    case "INTERNAL":
    default:
      return 500;
  }
}
