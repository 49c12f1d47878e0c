/**
 * Shared error types for LLM provider failures
 *
 * Anything that goes wrong inside the breaker-guarded provider call is a
 * ProviderError; the subclasses carry what is known about the upstream.
 */

/**
 * Base class for failures during the guarded provider call.
 * Counted toward the circuit breaker threshold.
 */
export class ProviderError extends Error {
  readonly name: string = "ProviderError";

  constructor(
    message: string,
    public readonly provider: string,
    public readonly elapsedMs: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Wrap an arbitrary thrown value, keeping ProviderErrors as they are.
   */
  static from(error: unknown, provider: string, elapsedMs: number): ProviderError {
    if (error instanceof ProviderError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new ProviderError(`${provider} call failed: ${message}`, provider, elapsedMs, { cause: error });
  }
}

/**
 * Upstream timeout error - thrown when the provider call times out
 */
export class UpstreamTimeoutError extends ProviderError {
  readonly name = "UpstreamTimeoutError";

  constructor(
    message: string,
    provider: string,
    public readonly timeoutMs: number,
    elapsedMs: number,
    options?: { cause?: unknown }
  ) {
    super(message, provider, elapsedMs, options);
  }
}

/**
 * Upstream HTTP error - thrown when the provider returns a non-2xx status
 *
 * Captures the HTTP status code, provider-specific error code, and request ID
 * for cross-referencing with provider logs.
 */
export class UpstreamHTTPError extends ProviderError {
  readonly name = "UpstreamHTTPError";

  constructor(
    message: string,
    provider: string,
    public readonly status: number,
    public readonly code: string | undefined,
    public readonly requestId: string | undefined,
    elapsedMs: number,
    options?: { cause?: unknown }
  ) {
    super(message, provider, elapsedMs, options);
  }
}
