/**
 * /healthz and /v1/status - Service Diagnostics
 *
 * - /healthz: Simple liveness check (ok/version/provider)
 * - /v1/status: Runtime diagnostics: request counters, circuit breaker
 *   state, generation metrics
 *
 * **Security:** No authentication required (metrics only, no sensitive data)
 */

import type { FastifyInstance } from "fastify";
import type { CircuitBreakerStats } from "../utils/circuit-breaker.js";
import type { GenerationMetricsSnapshot } from "../generation/metrics.js";
import type { GenerationOrchestrator } from "../generation/orchestrator.js";
import { SERVICE_NAME, SERVICE_VERSION } from "../version.js";

// Track service uptime
const SERVICE_START_TIME = Date.now();

// Request counters (in-memory, reset on restart)
let totalRequests = 0;
let client4xxErrors = 0;
let server5xxErrors = 0;

export function incrementRequestCount(): void {
  totalRequests++;
}

/**
 * Count a finished request by status. Only 5xx are true service errors.
 */
export function incrementErrorCount(statusCode: number): void {
  if (statusCode >= 500) {
    server5xxErrors++;
  } else if (statusCode >= 400) {
    client4xxErrors++;
  }
}

/** @internal */
export function _resetRequestCounters(): void {
  totalRequests = 0;
  client4xxErrors = 0;
  server5xxErrors = 0;
}

export interface HealthResponse {
  ok: boolean;
  service: string;
  version: string;
  provider: string;
  model: string;
}

export interface StatusResponse {
  service: string;
  version: string;
  uptime_seconds: number;
  timestamp: string;

  requests: {
    total: number;
    client_errors_4xx: number;
    server_errors_5xx: number;
    error_rate_5xx: number;
  };

  llm: {
    provider: string;
    model: string;
  };

  circuit_breaker: CircuitBreakerStats;
  generation: GenerationMetricsSnapshot;
  events: {
    append_failures: number;
  };
}

export interface StatusRouteDeps {
  orchestrator: GenerationOrchestrator;
}

export async function statusRoutes(app: FastifyInstance, deps: StatusRouteDeps): Promise<void> {
  app.get("/healthz", async (): Promise<HealthResponse> => {
    const { provider } = deps.orchestrator;
    return {
      ok: true,
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      provider: provider.name,
      model: provider.model,
    };
  });

  app.get("/v1/status", async (): Promise<StatusResponse> => {
    const status = deps.orchestrator.status();
    const errorRate5xx = totalRequests > 0 ? server5xxErrors / totalRequests : 0;

    return {
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      uptime_seconds: Math.floor((Date.now() - SERVICE_START_TIME) / 1000),
      timestamp: new Date().toISOString(),
      requests: {
        total: totalRequests,
        client_errors_4xx: client4xxErrors,
        server_errors_5xx: server5xxErrors,
        error_rate_5xx: Math.round(errorRate5xx * 10000) / 100, // Percentage with 2 decimals
      },
      llm: {
        provider: status.provider,
        model: status.model,
      },
      circuit_breaker: status.breaker,
      generation: status.metrics,
      events: {
        append_failures: status.eventAppendFailures,
      },
    };
  });
}
