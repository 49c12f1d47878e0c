import { GENERATION_MODES, type GenerationMode } from "../config/modes.js";
import { log } from "../utils/telemetry.js";

export interface ModeCounts {
  successCount: number;
  failureCount: number;
}

export interface GenerationMetricsSnapshot {
  generationCount: number;
  jsonFailures: number;
  averageCacheHitRate: number | null;
  modes: Record<GenerationMode, ModeCounts>;
}

export interface CacheSample {
  hitRate: number;
  /** True when this sample lands on a log interval boundary */
  logDue: boolean;
}

/**
 * Process-lifetime generation counters, owned by one orchestrator.
 *
 * Every mutation is a single synchronous step, so concurrent requests
 * never lose an update.
 */
export class GenerationMetrics {
  private generationCount = 0;
  private totalCacheHitRate = 0;
  private jsonFailures = 0;
  private readonly modes: Record<GenerationMode, ModeCounts>;

  constructor(private readonly cacheHitLogInterval: number) {
    this.modes = {
      base: { successCount: 0, failureCount: 0 },
      talk: { successCount: 0, failureCount: 0 },
      expert: { successCount: 0, failureCount: 0 },
      creative: { successCount: 0, failureCount: 0 },
    };
  }

  /**
   * Count one drained provider call. Returns the cache sample when the
   * provider reported any prompt tokens, null otherwise.
   */
  recordGeneration(hitTokens: number, missTokens: number): CacheSample | null {
    this.generationCount++;

    const total = hitTokens + missTokens;
    if (total <= 0) {
      return null;
    }

    const hitRate = hitTokens / total;
    this.totalCacheHitRate += hitRate;
    const logDue = this.generationCount % this.cacheHitLogInterval === 0;

    if (logDue) {
      log.info(
        {
          generations: this.generationCount,
          avg_cache_hit_rate: this.averageCacheHitRate(),
          last_cache_hit_rate: hitRate,
        },
        "Prompt cache metrics"
      );
    }

    return { hitRate, logDue };
  }

  recordJsonFailure(): void {
    this.jsonFailures++;
  }

  recordValidation(mode: GenerationMode, valid: boolean): void {
    if (valid) {
      this.modes[mode].successCount++;
    } else {
      this.modes[mode].failureCount++;
    }
  }

  averageCacheHitRate(): number | null {
    return this.generationCount > 0 ? this.totalCacheHitRate / this.generationCount : null;
  }

  snapshot(): GenerationMetricsSnapshot {
    return {
      generationCount: this.generationCount,
      jsonFailures: this.jsonFailures,
      averageCacheHitRate: this.averageCacheHitRate(),
      modes: {
        base: { ...this.modes.base },
        talk: { ...this.modes.talk },
        expert: { ...this.modes.expert },
        creative: { ...this.modes.creative },
      },
    };
  }

  /**
   * Final summary, logged once on shutdown.
   */
  logSummary(): void {
    log.info(
      { generations: this.generationCount, json_failures: this.jsonFailures },
      "Generation summary"
    );

    const successes = GENERATION_MODES.reduce((sum, mode) => sum + this.modes[mode].successCount, 0);
    if (successes > 0) {
      log.info(
        { mode_success: Object.fromEntries(GENERATION_MODES.map((m) => [m, this.modes[m].successCount])) },
        "Mode validation success"
      );
    }
  }
}
