import { describe, it, expect } from "vitest";
import { GenerationMetrics } from "../../src/generation/metrics.js";

describe("GenerationMetrics", () => {
  it("counts generations without prompt tokens but returns no sample", () => {
    const metrics = new GenerationMetrics(10);

    expect(metrics.recordGeneration(0, 0)).toBeNull();
    expect(metrics.snapshot().generationCount).toBe(1);
    expect(metrics.averageCacheHitRate()).toBe(0);
  });

  it("computes the hit rate and flags log intervals", () => {
    const metrics = new GenerationMetrics(2);

    expect(metrics.recordGeneration(1, 3)).toEqual({ hitRate: 0.25, logDue: false });
    expect(metrics.recordGeneration(3, 1)).toEqual({ hitRate: 0.75, logDue: true });
    expect(metrics.averageCacheHitRate()).toBe(0.5);
  });

  it("tracks JSON failures and per-mode validation outcomes", () => {
    const metrics = new GenerationMetrics(10);

    metrics.recordJsonFailure();
    metrics.recordValidation("talk", true);
    metrics.recordValidation("talk", false);
    metrics.recordValidation("expert", true);

    const snapshot = metrics.snapshot();
    expect(snapshot.jsonFailures).toBe(1);
    expect(snapshot.modes).toEqual({
      base: { successCount: 0, failureCount: 0 },
      talk: { successCount: 1, failureCount: 1 },
      expert: { successCount: 1, failureCount: 0 },
      creative: { successCount: 0, failureCount: 0 },
    });
  });

  it("returns snapshots detached from live counters", () => {
    const metrics = new GenerationMetrics(10);
    const before = metrics.snapshot();

    metrics.recordValidation("base", true);

    expect(before.modes.base.successCount).toBe(0);
    expect(metrics.snapshot().modes.base.successCount).toBe(1);
  });

  it("has no average before the first generation", () => {
    expect(new GenerationMetrics(10).averageCacheHitRate()).toBeNull();
  });
});
