/**
 * Circuit breaker guarding calls to the LLM provider.
 *
 * States:
 * - CLOSED: Normal operation, calls go through
 * - OPEN: Circuit tripped, calls fail fast with BreakerOpenError
 * - HALF_OPEN: Recovery window elapsed, exactly one trial call admitted
 *
 * One instance per provider endpoint, shared by every in-flight request.
 * Admission and outcome recording are synchronous, so each transition runs
 * to completion before any other caller observes the state.
 */

import { log, emit, TelemetryEvents } from "./telemetry.js";
import { BreakerOpenError } from "./errors.js";

export type CircuitState = "CLOSED" | "OPEN" | "HALF_OPEN";

export interface CircuitBreakerConfig {
  failureThreshold: number; // Consecutive failures before opening circuit
  recoveryTimeoutMs: number; // Milliseconds before a trial call (OPEN → HALF_OPEN)
}

export interface CircuitBreakerStats {
  name: string;
  state: CircuitState;
  failures: number;
  lastFailureTime: number | null;
  lastTransitionTime: number;
  nextRetryTime: number | null;
  timeUntilRetry: number | null;
}

export class CircuitBreaker {
  private state: CircuitState = "CLOSED";
  private failures = 0;
  private lastFailureTime: number | null = null;
  private lastTransitionTime = Date.now();
  private trialInFlight = false;

  constructor(
    readonly name: string,
    private readonly config: CircuitBreakerConfig
  ) {
    if (config.failureThreshold < 1) {
      throw new Error("CircuitBreaker failureThreshold must be at least 1");
    }
  }

  /**
   * Run `operation` under the breaker. Rejects with BreakerOpenError,
   * without invoking `operation`, while the circuit is open.
   */
  async call<T>(operation: () => Promise<T>): Promise<T> {
    const isTrial = this.admit();

    let result: T;
    try {
      result = await operation();
    } catch (error) {
      this.recordFailure(isTrial, error);
      throw error;
    }
    this.recordSuccess(isTrial);
    return result;
  }

  /**
   * Decide whether a call may proceed. Returns true when the call is the
   * HALF_OPEN trial.
   */
  private admit(): boolean {
    const now = Date.now();

    switch (this.state) {
      case "CLOSED":
        return false;

      case "OPEN": {
        const nextRetry = this.nextRetryTime() ?? now;
        if (now < nextRetry) {
          throw this.rejection(nextRetry - now);
        }
        this.transition("HALF_OPEN", now);
        this.trialInFlight = true;
        emit(TelemetryEvents.CircuitHalfOpen, { breaker: this.name, failures: this.failures });
        return true;
      }

      case "HALF_OPEN":
      default:
        // A trial is already running; everyone else keeps failing fast
        throw this.rejection(0);
    }
  }

  private rejection(retryAfterMs: number): BreakerOpenError {
    emit(TelemetryEvents.CircuitRejected, {
      breaker: this.name,
      state: this.state,
      retry_after_ms: retryAfterMs,
    });
    return new BreakerOpenError(this.name, retryAfterMs);
  }

  private recordSuccess(isTrial: boolean): void {
    if (isTrial) {
      this.trialInFlight = false;
      this.failures = 0;
      this.lastFailureTime = null;
      this.transition("CLOSED", Date.now());
      log.info({ breaker: this.name }, "Circuit breaker closed after successful trial");
      emit(TelemetryEvents.CircuitClosed, { breaker: this.name });
      return;
    }

    if (this.state === "CLOSED") {
      // Only consecutive failures count
      this.failures = 0;
    }
  }

  private recordFailure(isTrial: boolean, error: unknown): void {
    const now = Date.now();
    const reason = error instanceof Error ? error.message : String(error);

    if (isTrial) {
      // Counter stays at threshold; the recovery window restarts
      this.trialInFlight = false;
      this.lastFailureTime = now;
      this.transition("OPEN", now);
      log.warn({ breaker: this.name, reason }, "Circuit breaker trial failed, reopening");
      emit(TelemetryEvents.CircuitOpened, {
        breaker: this.name,
        failures: this.failures,
        from_state: "HALF_OPEN",
        reason,
      });
      return;
    }

    if (this.state === "OPEN") {
      // Admitted before the circuit opened; the counter stays at threshold
      this.lastFailureTime = now;
      return;
    }
    if (this.state === "HALF_OPEN") {
      return;
    }

    this.failures++;
    this.lastFailureTime = now;

    if (this.failures >= this.config.failureThreshold) {
      this.transition("OPEN", now);
      log.warn(
        { breaker: this.name, failures: this.failures, reason },
        "Circuit breaker opened"
      );
      emit(TelemetryEvents.CircuitOpened, {
        breaker: this.name,
        failures: this.failures,
        from_state: "CLOSED",
        reason,
      });
    }
  }

  private transition(next: CircuitState, now: number): void {
    this.state = next;
    this.lastTransitionTime = now;
  }

  private nextRetryTime(): number | null {
    if (this.state !== "OPEN" || this.lastFailureTime === null) {
      return null;
    }
    return this.lastFailureTime + this.config.recoveryTimeoutMs;
  }

  getState(): CircuitState {
    return this.state;
  }

  getFailureCount(): number {
    return this.failures;
  }

  isTrialInFlight(): boolean {
    return this.trialInFlight;
  }

  /**
   * Circuit breaker statistics for /v1/status
   */
  stats(): CircuitBreakerStats {
    const nextRetryTime = this.nextRetryTime();
    return {
      name: this.name,
      state: this.state,
      failures: this.failures,
      lastFailureTime: this.lastFailureTime,
      lastTransitionTime: this.lastTransitionTime,
      nextRetryTime,
      timeUntilRetry: nextRetryTime !== null ? Math.max(0, nextRetryTime - Date.now()) : null,
    };
  }

  /**
   * Reset circuit breaker state (for testing and admin use)
   */
  reset(): void {
    this.state = "CLOSED";
    this.failures = 0;
    this.lastFailureTime = null;
    this.trialInFlight = false;
    this.lastTransitionTime = Date.now();
  }
}
