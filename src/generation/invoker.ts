/**
 * Generation Invoker
 *
 * One provider round trip: resolve sampling parameters for the mode, stream
 * the completion through the circuit breaker, and aggregate the chunks.
 * The whole drain happens inside the guarded call, so a stream that fails
 * halfway counts as a breaker failure.
 */

import type { ModeParameterTable, GenerationMode } from "../config/modes.js";
import type { PromptPhase } from "../prompts/composer.js";
import { ProviderError } from "../adapters/llm/errors.js";
import type { ChatMessage, StreamChunk, StreamingChatProvider } from "../adapters/llm/types.js";
import type { CircuitBreaker } from "../utils/circuit-breaker.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";
import { EventTypes, StreamIds, type EventPublisher } from "./events.js";
import type { GenerationMetrics } from "./metrics.js";

export interface InvocationResult {
  text: string;
  cacheHitTokens: number;
  cacheMissTokens: number;
}

export interface GenerationInvokerDeps {
  provider: StreamingChatProvider;
  breaker: CircuitBreaker;
  modeParams: ModeParameterTable;
  metrics: GenerationMetrics;
  events: EventPublisher;
  debugModeSelection?: boolean;
}

/**
 * Concatenate content in arrival order. Usage is cumulative, so the last
 * chunk that carries it wins.
 */
export async function drainStream(stream: AsyncIterable<StreamChunk>): Promise<InvocationResult> {
  let text = "";
  let cacheHitTokens = 0;
  let cacheMissTokens = 0;

  for await (const chunk of stream) {
    if (chunk.content) {
      text += chunk.content;
    }
    if (chunk.usage) {
      cacheHitTokens = chunk.usage.promptCacheHitTokens;
      cacheMissTokens = chunk.usage.promptCacheMissTokens;
    }
  }

  return { text, cacheHitTokens, cacheMissTokens };
}

export class GenerationInvoker {
  constructor(private readonly deps: GenerationInvokerDeps) {}

  async invoke(
    messages: ChatMessage[],
    mode: GenerationMode,
    phase: PromptPhase
  ): Promise<InvocationResult> {
    const { provider, breaker } = this.deps;
    const params = this.deps.modeParams.resolve(mode);
    const jsonMode = phase === "structured";

    if (this.deps.debugModeSelection) {
      log.debug({ mode, phase, params }, "Resolved generation parameters");
    }

    const startTime = Date.now();
    const result = await breaker.call(async () => {
      try {
        const stream = await provider.streamChat({ messages, params: { ...params }, jsonMode });
        return await drainStream(stream);
      } catch (error) {
        throw ProviderError.from(error, provider.name, Date.now() - startTime);
      }
    });

    this.recordCacheUsage(result);
    return result;
  }

  private recordCacheUsage({ cacheHitTokens, cacheMissTokens }: InvocationResult): void {
    const sample = this.deps.metrics.recordGeneration(cacheHitTokens, cacheMissTokens);
    if (!sample) {
      return;
    }

    this.deps.events.publish(StreamIds.metrics, EventTypes.CacheHitMetric, {
      prompt_cache_hit_tokens: cacheHitTokens,
      prompt_cache_miss_tokens: cacheMissTokens,
      cache_hit_rate: sample.hitRate,
      timestamp: new Date().toISOString(),
    });
    emit(TelemetryEvents.CacheHitMetric, {
      prompt_cache_hit_tokens: cacheHitTokens,
      prompt_cache_miss_tokens: cacheMissTokens,
      cache_hit_rate: sample.hitRate,
    });
  }
}
