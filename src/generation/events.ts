/**
 * Observability events and the side channel that delivers them.
 *
 * Events are published fire-and-forget: the publisher queues appends on a
 * single promise chain so the sink sees them in emission order, and the
 * response path never waits on (or fails because of) the sink.
 */

import { emit, log, TelemetryEvents } from "../utils/telemetry.js";

export const EventTypes = {
  GenerationParametersUsed: "GenerationParametersUsedEvent",
  JsonValidationFailed: "JSONValidationFailedEvent",
  JsonModeFailure: "JSONModeFailureEvent",
  CacheHitMetric: "CacheHitMetricEvent",
} as const;

export type EventType = (typeof EventTypes)[keyof typeof EventTypes];

export const StreamIds = {
  generation: (userId: string) => `generation_${userId}`,
  validation: (userId: string) => `validation_${userId}`,
  user: (userId: string) => `user_${userId}`,
  metrics: "metrics",
} as const;

export interface ObservabilityEvent {
  readonly streamId: string;
  readonly eventType: EventType;
  readonly data: Readonly<Record<string, unknown>>;
  /** ISO-8601 */
  readonly timestamp: string;
}

export interface RecordedEvent extends ObservabilityEvent {
  /** Position within the stream, assigned by the sink (0-based) */
  readonly version: number;
}

/**
 * Append-only, per-stream ordered event log.
 */
export interface EventSink {
  append(event: ObservabilityEvent): Promise<void>;
}

/**
 * Retains every event per stream. Unbounded, so only for tests and
 * short-lived tooling.
 */
export class InMemoryEventSink implements EventSink {
  private readonly streams = new Map<string, RecordedEvent[]>();

  async append(event: ObservabilityEvent): Promise<void> {
    let events = this.streams.get(event.streamId);
    if (!events) {
      events = [];
      this.streams.set(event.streamId, events);
    }
    events.push({ ...event, version: events.length });
  }

  getEvents(streamId: string): RecordedEvent[] {
    return [...(this.streams.get(streamId) ?? [])];
  }

  listStreams(): string[] {
    return Array.from(this.streams.keys());
  }
}

/**
 * Default sink when no event store is wired in: each event becomes a debug
 * log line and nothing is retained.
 */
export class LoggingEventSink implements EventSink {
  async append(event: ObservabilityEvent): Promise<void> {
    log.debug(
      { stream_id: event.streamId, event_type: event.eventType, data: event.data },
      "Observability event"
    );
  }
}

export const DEFAULT_APPEND_TIMEOUT_MS = 5_000;

export interface EventPublisherOptions {
  /** Upper bound on a single append; a timed-out append counts as a failure */
  appendTimeoutMs?: number;
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(
      () => reject(new Error(`Event append timed out after ${timeoutMs}ms`)),
      timeoutMs
    );
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export class EventPublisher {
  private tail: Promise<void> = Promise.resolve();
  private failures = 0;
  private readonly appendTimeoutMs: number;

  constructor(
    private readonly sink: EventSink,
    options: EventPublisherOptions = {}
  ) {
    this.appendTimeoutMs = options.appendTimeoutMs ?? DEFAULT_APPEND_TIMEOUT_MS;
  }

  /**
   * Queue an event. Never throws; append failures are logged and counted.
   */
  publish(streamId: string, eventType: EventType, data: Record<string, unknown>): ObservabilityEvent {
    const event: ObservabilityEvent = Object.freeze({
      streamId,
      eventType,
      data: Object.freeze({ ...data }),
      timestamp: new Date().toISOString(),
    });

    this.tail = this.tail.then(() => this.deliver(event));
    return event;
  }

  /**
   * Resolves once every event queued so far has been appended, failed or
   * timed out.
   */
  flush(): Promise<void> {
    return this.tail;
  }

  failureCount(): number {
    return this.failures;
  }

  private async deliver(event: ObservabilityEvent): Promise<void> {
    try {
      await withTimeout(this.sink.append(event), this.appendTimeoutMs);
    } catch (error) {
      this.failures++;
      log.warn(
        { error, stream_id: event.streamId, event_type: event.eventType },
        "Failed to append observability event"
      );
      emit(TelemetryEvents.EventAppendFailed, {
        stream_id: event.streamId,
        event_type: event.eventType,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
