import { describe, it, expect, afterEach, vi } from "vitest";
import { _resetConfigCache, getConfig } from "../../src/config/index.js";
import { ProviderError } from "../../src/adapters/llm/errors.js";
import { InMemoryEventSink, type EventSink } from "../../src/generation/events.js";
import {
  createGenerationOrchestrator,
  createGenerationRequest,
} from "../../src/generation/orchestrator.js";
import { DEFAULT_PROMPTS } from "../../src/prompts/defaults.js";
import { BreakerOpenError, GenerationFailedError } from "../../src/utils/errors.js";
import { FakeProvider, type ScriptedReply } from "../utils/fake-provider.js";
import { captureTelemetry } from "../utils/telemetry-capture.js";

function setup(env: Record<string, string>, ...replies: ScriptedReply[]) {
  for (const [key, value] of Object.entries(env)) {
    vi.stubEnv(key, value);
  }
  _resetConfigCache();

  const provider = new FakeProvider(...replies);
  const sink = new InMemoryEventSink();
  const orchestrator = createGenerationOrchestrator({ provider, sink, config: getConfig() });
  return { provider, sink, orchestrator };
}

const hello = (mode = "base") =>
  createGenerationRequest({ userId: "u1", text: "hello", mode, includePrompt: true });

describe("GenerationOrchestrator", () => {
  let telemetry: ReturnType<typeof captureTelemetry> | undefined;

  afterEach(() => {
    telemetry?.stop();
    telemetry = undefined;
    vi.unstubAllEnvs();
  });

  describe("structured phase", () => {
    it("returns the extracted response and publishes one parameters-used event", async () => {
      const { provider, sink, orchestrator } = setup({}, '{"response":"hi there"}');

      await expect(orchestrator.generate(hello())).resolves.toBe("hi there");
      await orchestrator.flushEvents();

      expect(provider.callCount).toBe(1);
      expect(provider.requests[0]?.jsonMode).toBe(true);
      expect(provider.requests[0]?.messages).toEqual([
        { role: "system", content: DEFAULT_PROMPTS.base.json },
        { role: "user", content: "hello" },
      ]);

      const events = sink.getEvents("generation_u1");
      expect(events).toHaveLength(1);
      expect(events[0]?.eventType).toBe("GenerationParametersUsedEvent");
      expect(events[0]?.data).toMatchObject({
        user_id: "u1",
        mode: "base",
        temperature: 0.82,
        top_p: 0.85,
        max_tokens: 1800,
        frequency_penalty: 0.4,
        presence_penalty: 0.65,
        response_length: 8,
      });
    });

    it("renders a non-string response value", async () => {
      const { orchestrator } = setup({}, '{"response":42}');
      await expect(orchestrator.generate(hello())).resolves.toBe("42");
    });

    it("reports null response length when length logging is off", async () => {
      const { sink, orchestrator } = setup({ LOG_RESPONSE_LENGTH: "false" }, '{"response":"hi"}');

      await orchestrator.generate(hello());
      await orchestrator.flushEvents();

      expect(sink.getEvents("generation_u1")[0]?.data.response_length).toBeNull();
    });

    it("publishes no parameters-used event when usage logging is off", async () => {
      const { sink, orchestrator } = setup({ LOG_PARAMETERS_USAGE: "false" }, '{"response":"hi"}');

      await orchestrator.generate(hello());
      await orchestrator.flushEvents();

      expect(sink.getEvents("generation_u1")).toHaveLength(0);
    });
  });

  describe("parse failure", () => {
    it("retries once in the fallback phase and returns the raw fallback text", async () => {
      telemetry = captureTelemetry();
      const { provider, sink, orchestrator } = setup({}, "not json", "plain fallback");

      await expect(orchestrator.generate(hello())).resolves.toBe("plain fallback");
      await orchestrator.flushEvents();

      expect(provider.callCount).toBe(2);
      expect(provider.requests[1]?.jsonMode).toBe(false);
      expect(provider.requests[1]?.messages[0]).toEqual({
        role: "system",
        content: DEFAULT_PROMPTS.base.normal,
      });

      const failures = sink.getEvents("user_u1");
      expect(failures).toHaveLength(1);
      expect(failures[0]?.eventType).toBe("JSONModeFailureEvent");
      expect(failures[0]?.data.user_id).toBe("u1");
      expect(String(failures[0]?.data.error)).toMatch(/^Structured response is not valid JSON/);

      expect(orchestrator.status().metrics.jsonFailures).toBe(1);
      expect(sink.getEvents("generation_u1")).toHaveLength(0);
      expect(telemetry.ofType("generation.succeeded")[0]?.data.fallback_used).toBe(true);
    });

    it("treats a missing response field as a parse failure", async () => {
      const { provider, sink, orchestrator } = setup({}, '{"answer":"x"}', "fallback text");

      await expect(orchestrator.generate(hello())).resolves.toBe("fallback text");
      await orchestrator.flushEvents();

      expect(provider.callCount).toBe(2);
      expect(sink.getEvents("user_u1")[0]?.data.error).toBe("JSON doesn't contain 'response' field");
    });

    it("returns the original raw text when fallback is disabled", async () => {
      const { provider, sink, orchestrator } = setup(
        { JSON_FALLBACK_ENABLED: "false" },
        "not json",
        "never requested"
      );

      await expect(orchestrator.generate(hello())).resolves.toBe("not json");
      await orchestrator.flushEvents();

      expect(provider.callCount).toBe(1);
      expect(sink.getEvents("user_u1")).toHaveLength(1);
    });

    it("fails when the fallback call itself fails", async () => {
      const { orchestrator } = setup({}, "not json", new Error("upstream 500"));

      const error = await orchestrator.generate(hello()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(GenerationFailedError);
      expect(error).toMatchObject({ message: "fake call failed: upstream 500" });
    });
  });

  describe("advisory validation", () => {
    it("publishes a validation event but still returns the response", async () => {
      const { sink, orchestrator } = setup({}, '{"response":"deep answer"}');

      await expect(orchestrator.generate(hello("expert"))).resolves.toBe("deep answer");
      await orchestrator.flushEvents();

      const failures = sink.getEvents("validation_u1");
      expect(failures).toHaveLength(1);
      expect(failures[0]?.eventType).toBe("JSONValidationFailedEvent");
      expect(failures[0]?.data).toMatchObject({
        user_id: "u1",
        errors: ["topic: Required", "confidence: Required", "key_points: Required"],
        response_fields: ["response"],
      });
      expect(orchestrator.status().metrics.modes.expert).toEqual({ successCount: 0, failureCount: 1 });
    });

    it("counts a valid payload as a mode success", async () => {
      const { sink, orchestrator } = setup(
        {},
        '{"response":"hey!","emotional_tone":"warm","engagement_level":0.8}'
      );

      await orchestrator.generate(hello("talk"));
      await orchestrator.flushEvents();

      expect(sink.getEvents("validation_u1")).toHaveLength(0);
      expect(orchestrator.status().metrics.modes.talk).toEqual({ successCount: 1, failureCount: 0 });
    });

    it("skips validation when failure logging is off", async () => {
      const { sink, orchestrator } = setup(
        { JSON_VALIDATION_LOG_FAILURES: "false" },
        '{"response":"deep answer"}'
      );

      await orchestrator.generate(hello("expert"));
      await orchestrator.flushEvents();

      expect(sink.getEvents("validation_u1")).toHaveLength(0);
      expect(orchestrator.status().metrics.modes.expert).toEqual({ successCount: 0, failureCount: 0 });
    });
  });

  describe("structured mode disabled", () => {
    it("returns raw text from a fallback-phase call", async () => {
      const { provider, sink, orchestrator } = setup({ USE_JSON_MODE: "false" }, "raw text");

      await expect(orchestrator.generate(hello())).resolves.toBe("raw text");
      await orchestrator.flushEvents();

      expect(provider.requests[0]?.jsonMode).toBe(false);
      expect(sink.getEvents("generation_u1")[0]?.data.response_length).toBe(8);
    });
  });

  describe("provider failures", () => {
    it("fails fast once the breaker has opened", async () => {
      const { provider, orchestrator } = setup(
        { CIRCUIT_BREAKER_FAILURE_THRESHOLD: "3" },
        new Error("down")
      );

      for (let i = 0; i < 3; i++) {
        const error = await orchestrator.generate(hello()).catch((e: unknown) => e);
        expect(error).toBeInstanceOf(GenerationFailedError);
        expect(error instanceof GenerationFailedError && error.breakerOpen).toBe(false);
        expect(error instanceof GenerationFailedError && error.cause).toBeInstanceOf(ProviderError);
      }

      const fourth = await orchestrator.generate(hello()).catch((e: unknown) => e);
      expect(fourth).toBeInstanceOf(GenerationFailedError);
      expect(fourth instanceof GenerationFailedError && fourth.breakerOpen).toBe(true);
      expect(fourth instanceof GenerationFailedError && fourth.cause).toBeInstanceOf(BreakerOpenError);
      expect(provider.callCount).toBe(3);
      expect(orchestrator.status().breaker.state).toBe("OPEN");
    });
  });

  it("normalises unknown modes to base and reports the fallback", () => {
    telemetry = captureTelemetry();

    const request = createGenerationRequest({ userId: "u1", text: "hi", mode: "poetry" });

    expect(request).toEqual({ userId: "u1", text: "hi", mode: "base", includePrompt: true });
    expect(Object.isFrozen(request)).toBe(true);
    expect(telemetry.ofType("generation.mode_fallback")).toHaveLength(1);
  });

  it("closes the provider on shutdown", async () => {
    const { provider, orchestrator } = setup({}, '{"response":"hi"}');

    await orchestrator.shutdown();

    expect(provider.closed).toBe(true);
  });

  describe("event sink failures", () => {
    function withSink(sink: EventSink) {
      const provider = new FakeProvider('{"response":"hi"}');
      const orchestrator = createGenerationOrchestrator({ provider, sink, config: getConfig() });
      return { provider, orchestrator };
    }

    it("returns the response when every append rejects", async () => {
      const { orchestrator } = withSink({
        append: async () => {
          throw new Error("sink unavailable");
        },
      });

      await expect(orchestrator.generate(hello())).resolves.toBe("hi");
      await orchestrator.flushEvents();

      expect(orchestrator.status().eventAppendFailures).toBe(1);
    });

    it("delivers to the logging sink when no sink is given", async () => {
      const orchestrator = createGenerationOrchestrator({
        provider: new FakeProvider('{"response":"hi"}'),
        config: getConfig(),
      });

      await expect(orchestrator.generate(hello())).resolves.toBe("hi");
      await orchestrator.flushEvents();

      expect(orchestrator.status().eventAppendFailures).toBe(0);
    });

    it("shuts down when an append never settles", async () => {
      vi.stubEnv("EVENT_APPEND_TIMEOUT_MS", "20");
      _resetConfigCache();
      const { provider, orchestrator } = withSink({ append: () => new Promise(() => {}) });

      await expect(orchestrator.generate(hello())).resolves.toBe("hi");
      await expect(orchestrator.shutdown()).resolves.toBeUndefined();

      expect(orchestrator.status().eventAppendFailures).toBe(1);
      expect(provider.closed).toBe(true);
    });
  });
});
