import { env } from "node:process";
import pino from "pino";
import { StatsD } from "hot-shots";
import { createLoggerConfig } from "./logger-config.js";

/**
 * Pino logger with secret redaction
 *
 * Redaction paths centralized in src/utils/logger-config.ts
 * so the Fastify and standalone loggers stay in sync.
 */
export const log = pino(createLoggerConfig(env.LOG_LEVEL || "info"));

export type TelemetryLeaf = string | number | boolean | null | undefined;
export type TelemetryShape = {
  [key: string]: TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape>;
};
export type Event = Record<string, unknown>;

type TelemetrySinkFn = (eventName: string, data: TelemetryShape) => void;

/**
 * Test sink for capturing telemetry events in tests
 * Only used when NODE_ENV=test or VITEST=true
 */
let testSink: TelemetrySinkFn | null = null;

export function setTestSink(sink: TelemetrySinkFn | null): void {
  // Direct env check: config may not be parseable yet when tests install the sink
  const isTestEnv = env.NODE_ENV === "test" || Boolean(env.VITEST);
  if (!isTestEnv) {
    throw new Error("setTestSink() can only be used in test environment");
  }
  testSink = sink;
}

/**
 * Frozen telemetry event names
 * DO NOT modify these names without updating dashboards
 */
export const TelemetryEvents = {
  // Request lifecycle
  GenerationRequested: "generation.requested",
  GenerationSucceeded: "generation.succeeded",
  GenerationFailed: "generation.failed",

  // Structured output protocol
  JsonModeFailure: "generation.json_mode_failure",
  FallbackUsed: "generation.fallback_used",
  DegradedRawResponse: "generation.degraded_raw_response",
  ValidationFailed: "generation.validation_failed",
  ModeFallback: "generation.mode_fallback",

  // Provider prompt cache
  CacheHitMetric: "llm.cache_hit_metric",

  // Circuit breaker transitions
  CircuitOpened: "circuit.opened",
  CircuitHalfOpen: "circuit.half_open",
  CircuitClosed: "circuit.closed",
  CircuitRejected: "circuit.rejected",

  // Event sink side channel
  EventAppendFailed: "events.append_failed",
} as const;

export type TelemetryEventName = (typeof TelemetryEvents)[keyof typeof TelemetryEvents];

/**
 * Datadog StatsD client (optional, configured via DD_AGENT_HOST)
 */
let datadogClient: StatsD | null = null;

if (env.DD_AGENT_HOST) {
  datadogClient = new StatsD({
    host: env.DD_AGENT_HOST,
    port: Number(env.DD_AGENT_PORT) || 8125,
    prefix: "generation_service.",
    globalTags: {
      service: env.DD_SERVICE || "generation-service",
      env: env.DD_ENV || env.NODE_ENV || "development",
    },
    errorHandler: (error: Error) => {
      log.error({ error }, "Datadog StatsD error");
    },
  });
  log.info({ dd_host: env.DD_AGENT_HOST }, "Datadog StatsD client initialized");
}

function sanitizeTelemetryValue(
  value: unknown
): TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape> | undefined {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }

  if (Array.isArray(value)) {
    const sanitizedArray: Array<TelemetryLeaf | TelemetryShape> = [];
    for (const item of value) {
      const sanitizedItem = sanitizeTelemetryValue(item);
      if (sanitizedItem !== undefined && !Array.isArray(sanitizedItem)) {
        sanitizedArray.push(sanitizedItem);
      }
    }
    return sanitizedArray;
  }

  if (typeof value === "object") {
    return sanitizeTelemetryData(Object.fromEntries(Object.entries(value)));
  }

  return undefined;
}

function sanitizeTelemetryData(data: Event): TelemetryShape {
  const result: TelemetryShape = {};
  for (const [key, value] of Object.entries(data)) {
    const sanitized = sanitizeTelemetryValue(value);
    if (sanitized !== undefined) {
      result[key] = sanitized;
    }
  }
  return result;
}

function tagOf(value: unknown, fallback: string): string {
  return typeof value === "string" && value.length > 0 ? value : fallback;
}

/**
 * Emit telemetry event (logs + Datadog metrics)
 *
 * @param event Event name (use TelemetryEvents)
 * @param data Event data
 */
export function emit(event: TelemetryEventName, data: Event): void {
  const eventData = sanitizeTelemetryData(data);
  if (testSink) {
    testSink(event, eventData);
  }

  // Always log to pino
  log.info({ event, ...eventData });

  if (!datadogClient) {
    return;
  }

  try {
    switch (event) {
      case TelemetryEvents.GenerationSucceeded: {
        if (typeof eventData.latency_ms === "number") {
          datadogClient.histogram("generation.latency_ms", eventData.latency_ms, {
            mode: tagOf(eventData.mode, "unknown"),
          });
        }
        datadogClient.increment("generation.succeeded", 1, {
          mode: tagOf(eventData.mode, "unknown"),
          fallback_used: String(eventData.fallback_used === true),
        });
        break;
      }

      case TelemetryEvents.GenerationFailed: {
        datadogClient.increment("generation.failed", 1, {
          error_type: tagOf(eventData.error_type, "unknown"),
        });
        break;
      }

      case TelemetryEvents.JsonModeFailure:
      case TelemetryEvents.FallbackUsed:
      case TelemetryEvents.DegradedRawResponse:
      case TelemetryEvents.ValidationFailed: {
        datadogClient.increment(event, 1, {
          mode: tagOf(eventData.mode, "unknown"),
        });
        break;
      }

      case TelemetryEvents.CacheHitMetric: {
        if (typeof eventData.cache_hit_rate === "number") {
          datadogClient.histogram("llm.prompt_cache.hit_rate", eventData.cache_hit_rate);
        }
        break;
      }

      case TelemetryEvents.CircuitOpened:
      case TelemetryEvents.CircuitHalfOpen:
      case TelemetryEvents.CircuitClosed:
      case TelemetryEvents.CircuitRejected: {
        datadogClient.increment(event, 1, {
          breaker: tagOf(eventData.breaker, "unknown"),
        });
        break;
      }

      case TelemetryEvents.EventAppendFailed: {
        datadogClient.increment("events.append_failed", 1, {
          event_type: tagOf(eventData.event_type, "unknown"),
        });
        break;
      }

      default:
        // Debug-only events are not sent to Datadog
        break;
    }
  } catch (error) {
    // Never let telemetry break the application
    log.error({ error, event }, "Failed to send Datadog metrics");
  }
}

/**
 * Flush Datadog metrics (for graceful shutdown)
 */
export async function flushMetrics(): Promise<void> {
  const client = datadogClient;
  if (!client) {
    return;
  }
  await new Promise<void>((resolve, reject) => {
    client.close((error) => {
      if (error) {
        log.error({ error }, "Error flushing Datadog metrics");
        reject(error);
      } else {
        log.info("Datadog metrics flushed");
        resolve();
      }
    });
  });
}
