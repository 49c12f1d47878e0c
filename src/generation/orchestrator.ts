/**
 * Generation Orchestrator
 *
 * End-to-end protocol for one request:
 *
 *   1. Compose structured-phase messages (fallback phase when JSON mode is off)
 *   2. Invoke through the breaker; breaker and provider errors are fatal
 *   3. Extract the structured payload
 *      - parse failure: count it, publish JSONModeFailureEvent, then either
 *        retry exactly once in the fallback phase or return the raw text
 *      - success: advisory validation, parameters-used event, return `response`
 *
 * Observability events go out through the EventPublisher side channel and
 * never delay or fail the response.
 */

import { config as appConfig, type Config } from "../config/index.js";
import {
  ModeParameterTable,
  isGenerationMode,
  resolveMode,
  type GenerationMode,
} from "../config/modes.js";
import { ProviderError } from "../adapters/llm/errors.js";
import type { StreamingChatProvider } from "../adapters/llm/types.js";
import { PromptComposer } from "../prompts/composer.js";
import { BaseResponseSchema } from "../schemas/structured-responses.js";
import { CircuitBreaker, type CircuitBreakerStats } from "../utils/circuit-breaker.js";
import {
  BreakerOpenError,
  GenerationFailedError,
  ParseError,
  ValidationError,
} from "../utils/errors.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";
import { EventPublisher, EventTypes, LoggingEventSink, StreamIds, type EventSink } from "./events.js";
import { StructuredExtractor, renderResponse, type StructuredPayload } from "./extractor.js";
import { GenerationInvoker } from "./invoker.js";
import { GenerationMetrics, type GenerationMetricsSnapshot } from "./metrics.js";
import { SchemaValidator, formatIssue } from "./validator.js";

export interface GenerationRequest {
  readonly userId: string;
  readonly text: string;
  readonly mode: GenerationMode;
  readonly includePrompt: boolean;
}

export interface GenerationRequestInput {
  userId: string;
  text: string;
  mode?: string | null;
  includePrompt?: boolean;
}

/**
 * Build an immutable request, normalising the mode. Unknown modes become
 * "base".
 */
export function createGenerationRequest(input: GenerationRequestInput): GenerationRequest {
  const mode = resolveMode(input.mode);
  if (input.mode && !isGenerationMode(input.mode)) {
    emit(TelemetryEvents.ModeFallback, { user_id: input.userId, requested_mode: input.mode, mode });
  }
  return Object.freeze({
    userId: input.userId,
    text: input.text,
    mode,
    includePrompt: input.includePrompt ?? true,
  });
}

export interface OrchestratorOptions {
  structuredEnabled: boolean;
  fallbackEnabled: boolean;
  logParametersUsage: boolean;
  logResponseLength: boolean;
  /** Run the advisory validator on parsed payloads */
  validateStructured: boolean;
}

export interface GenerationOrchestratorDeps {
  provider: StreamingChatProvider;
  breaker: CircuitBreaker;
  modeParams: ModeParameterTable;
  metrics: GenerationMetrics;
  events: EventPublisher;
  composer: PromptComposer;
  invoker: GenerationInvoker;
  extractor: StructuredExtractor;
  validator: SchemaValidator;
  options: OrchestratorOptions;
}

export interface OrchestratorStatus {
  provider: string;
  model: string;
  breaker: CircuitBreakerStats;
  metrics: GenerationMetricsSnapshot;
  eventAppendFailures: number;
}

interface RunResult {
  text: string;
  fallbackUsed: boolean;
}

export class GenerationOrchestrator {
  constructor(private readonly deps: GenerationOrchestratorDeps) {}

  get provider(): StreamingChatProvider {
    return this.deps.provider;
  }

  /**
   * @throws GenerationFailedError when the breaker is open or the provider
   * call fails
   */
  async generate(request: GenerationRequest): Promise<string> {
    const startTime = Date.now();
    emit(TelemetryEvents.GenerationRequested, {
      user_id: request.userId,
      mode: request.mode,
      include_prompt: request.includePrompt,
    });

    try {
      const result = await this.run(request);
      emit(TelemetryEvents.GenerationSucceeded, {
        user_id: request.userId,
        mode: request.mode,
        fallback_used: result.fallbackUsed,
        response_length: result.text.length,
        latency_ms: Date.now() - startTime,
      });
      return result.text;
    } catch (error) {
      const failure = this.toGenerationFailure(error);
      emit(TelemetryEvents.GenerationFailed, {
        user_id: request.userId,
        mode: request.mode,
        error_type: failure.cause instanceof Error ? failure.cause.name : "unknown",
        error: failure.message,
        latency_ms: Date.now() - startTime,
      });
      throw failure;
    }
  }

  private async run(request: GenerationRequest): Promise<RunResult> {
    const { composer, invoker, extractor, options } = this.deps;
    const phase = options.structuredEnabled ? "structured" : "fallback";

    const messages = composer.compose(request.text, request.includePrompt, request.mode, phase);
    const first = await invoker.invoke(messages, request.mode, phase);

    if (!options.structuredEnabled) {
      this.publishParametersUsed(request, first.text.length);
      return { text: first.text, fallbackUsed: false };
    }

    let payload: StructuredPayload;
    try {
      payload = extractor.extract(first.text);
    } catch (error) {
      if (error instanceof ParseError) {
        return this.recoverFromParseFailure(request, first.text, error);
      }
      throw error;
    }

    this.runDiagnosticPass(payload);

    if (options.validateStructured) {
      this.validate(request, payload);
    }

    const text = renderResponse(payload.response);
    this.publishParametersUsed(request, text.length);
    return { text, fallbackUsed: false };
  }

  private async recoverFromParseFailure(
    request: GenerationRequest,
    rawText: string,
    error: ParseError
  ): Promise<RunResult> {
    const { composer, invoker, metrics, events, options } = this.deps;

    metrics.recordJsonFailure();
    events.publish(StreamIds.user(request.userId), EventTypes.JsonModeFailure, {
      user_id: request.userId,
      error: error.message,
      timestamp: new Date().toISOString(),
    });
    emit(TelemetryEvents.JsonModeFailure, {
      user_id: request.userId,
      mode: request.mode,
      error_type: error.name,
    });

    if (!options.fallbackEnabled) {
      emit(TelemetryEvents.DegradedRawResponse, { user_id: request.userId, mode: request.mode });
      return { text: rawText, fallbackUsed: false };
    }

    log.warn({ user_id: request.userId, mode: request.mode }, "Structured parse failed, using fallback");
    const messages = composer.compose(request.text, request.includePrompt, request.mode, "fallback");
    const retry = await invoker.invoke(messages, request.mode, "fallback");
    emit(TelemetryEvents.FallbackUsed, { user_id: request.userId, mode: request.mode });
    return { text: retry.text, fallbackUsed: true };
  }

  private validate(request: GenerationRequest, payload: StructuredPayload): void {
    const { validator, metrics, events } = this.deps;
    const outcome = validator.validate(payload, request.mode);

    if (!outcome.valid) {
      const errors = outcome.errors.map(formatIssue);
      events.publish(StreamIds.validation(request.userId), EventTypes.JsonValidationFailed, {
        user_id: request.userId,
        errors,
        response_fields: Object.keys(payload),
        timestamp: new Date().toISOString(),
      });
      emit(TelemetryEvents.ValidationFailed, {
        user_id: request.userId,
        mode: request.mode,
        error_count: errors.length,
      });
      log.warn(
        { user_id: request.userId, errors: errors.slice(0, 3) },
        "Structured response failed validation"
      );
    }

    metrics.recordValidation(request.mode, outcome.valid);
  }

  private publishParametersUsed(request: GenerationRequest, responseLength: number): void {
    const { options, modeParams, events } = this.deps;
    if (!options.logParametersUsage) {
      return;
    }

    const params = modeParams.resolve(request.mode);
    events.publish(StreamIds.generation(request.userId), EventTypes.GenerationParametersUsed, {
      user_id: request.userId,
      mode: request.mode,
      temperature: params.temperature,
      top_p: params.topP,
      max_tokens: params.maxTokens,
      frequency_penalty: params.frequencyPenalty,
      presence_penalty: params.presencePenalty,
      response_length: options.logResponseLength ? responseLength : null,
      timestamp: new Date().toISOString(),
    });
  }

  /**
   * Base-schema check on every structured payload, independent of the
   * validation settings. Debug output only.
   */
  private runDiagnosticPass(payload: StructuredPayload): void {
    try {
      const result = BaseResponseSchema.safeParse(payload);
      if (!result.success) {
        const error = new ValidationError(
          result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        );
        log.debug({ errors: error.errors }, error.message);
      }
    } catch (error) {
      log.debug({ error }, "Diagnostic schema pass threw");
    }
  }

  private toGenerationFailure(error: unknown): GenerationFailedError {
    if (error instanceof GenerationFailedError) {
      return error;
    }
    if (error instanceof BreakerOpenError || error instanceof ProviderError) {
      return new GenerationFailedError(error.message, { cause: error });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new GenerationFailedError(`Generation failed: ${message}`, { cause: error });
  }

  status(): OrchestratorStatus {
    return {
      provider: this.deps.provider.name,
      model: this.deps.provider.model,
      breaker: this.deps.breaker.stats(),
      metrics: this.deps.metrics.snapshot(),
      eventAppendFailures: this.deps.events.failureCount(),
    };
  }

  /**
   * Resolves once every queued observability event has been delivered.
   */
  flushEvents(): Promise<void> {
    return this.deps.events.flush();
  }

  async shutdown(): Promise<void> {
    await this.deps.events.flush();
    this.deps.metrics.logSummary();
    await this.deps.provider.close?.();
  }
}

export interface CreateOrchestratorOptions {
  provider: StreamingChatProvider;
  /** Defaults to a LoggingEventSink, which retains nothing */
  sink?: EventSink;
  breaker?: CircuitBreaker;
  config?: Config;
}

/**
 * Wire an orchestrator and its collaborators from configuration.
 */
export function createGenerationOrchestrator(opts: CreateOrchestratorOptions): GenerationOrchestrator {
  const cfg = opts.config ?? appConfig;
  const { provider } = opts;

  const modeParams = ModeParameterTable.fromConfig(cfg.generation.modeParams);
  const breaker = opts.breaker ?? new CircuitBreaker(`llm:${provider.name}`, cfg.breaker);
  const metrics = new GenerationMetrics(cfg.metrics.cacheHitLogInterval);
  const events = new EventPublisher(opts.sink ?? new LoggingEventSink(), {
    appendTimeoutMs: cfg.events.appendTimeoutMs,
  });

  const invoker = new GenerationInvoker({
    provider,
    breaker,
    modeParams,
    metrics,
    events,
    debugModeSelection: cfg.generation.debugModeSelection,
  });

  return new GenerationOrchestrator({
    provider,
    breaker,
    modeParams,
    metrics,
    events,
    composer: new PromptComposer(),
    invoker,
    extractor: new StructuredExtractor(),
    validator: new SchemaValidator({
      enabled: cfg.validation.enabled,
      maxErrors: cfg.validation.maxErrors,
    }),
    options: {
      structuredEnabled: cfg.generation.structuredEnabled,
      fallbackEnabled: cfg.generation.fallbackEnabled,
      logParametersUsage: cfg.generation.logParametersUsage,
      logResponseLength: cfg.generation.logResponseLength,
      validateStructured: cfg.validation.logFailures,
    },
  });
}
