import { describe, it, expect, afterEach, vi } from "vitest";
import { _resetConfigCache, getConfig } from "../../src/config/index.js";
import { GenerationActor } from "../../src/generation/actor.js";
import { InMemoryEventSink } from "../../src/generation/events.js";
import {
  createActorMessage,
  type ActorMessage,
  type MessageRouter,
} from "../../src/generation/messages.js";
import { FakeProvider, type ScriptedReply } from "../utils/fake-provider.js";

class RecordingRouter implements MessageRouter {
  readonly sent: Array<{ recipient: string; message: ActorMessage }> = [];
  /** Number of upcoming sends to reject */
  failures = 0;

  async sendMessage(recipient: string, message: ActorMessage): Promise<void> {
    if (this.failures > 0) {
      this.failures--;
      throw new Error("transport down");
    }
    this.sent.push({ recipient, message });
  }
}

async function startActor(env: Record<string, string>, ...replies: ScriptedReply[]) {
  for (const [key, value] of Object.entries(env)) {
    vi.stubEnv(key, value);
  }
  _resetConfigCache();

  const router = new RecordingRouter();
  const provider = new FakeProvider(...replies);
  const actor = new GenerationActor({
    router,
    provider,
    sink: new InMemoryEventSink(),
    config: getConfig(),
  });
  await actor.initialize();
  return { actor, router, provider };
}

const command = (payload: Record<string, unknown>) =>
  createActorMessage("telegram", "generate_response", payload);

describe("GenerationActor", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("sends a bot_response to the transport", async () => {
    const { actor, router } = await startActor({}, '{"response":"hi there"}');

    const result = await actor.handleMessage(command({ userId: "u1", chatId: 100, text: "hello" }));

    expect(result).toBeNull();
    expect(router.sent).toHaveLength(1);
    const [{ recipient, message }] = router.sent;
    expect(recipient).toBe("telegram");
    expect(message.senderId).toBe("generation");
    expect(message.messageType).toBe("bot_response");
    expect(message.payload).toMatchObject({ userId: "u1", chatId: 100, text: "hi there" });
    expect(typeof message.payload.generatedAt).toBe("string");
  });

  it("passes mode and prompt inclusion through", async () => {
    const { actor, provider } = await startActor({}, '{"response":"ok"}');

    await actor.handleMessage(
      command({ userId: "u1", chatId: "c1", text: "hello", includePrompt: false, mode: "creative" })
    );

    expect(provider.requests[0]?.messages).toEqual([{ role: "user", content: "hello" }]);
    expect(provider.requests[0]?.params.temperature).toBe(1.0);
  });

  it("ignores other message types", async () => {
    const { actor, router, provider } = await startActor({}, '{"response":"x"}');

    await expect(
      actor.handleMessage(createActorMessage("telegram", "ping", { userId: "u1" }))
    ).resolves.toBeNull();

    expect(router.sent).toHaveLength(0);
    expect(provider.callCount).toBe(0);
  });

  it("ignores a malformed command", async () => {
    const { actor, router } = await startActor({}, '{"response":"x"}');

    await actor.handleMessage(command({ chatId: 1, text: "no user" }));

    expect(router.sent).toHaveLength(0);
  });

  it("sends an error message when generation fails", async () => {
    const { actor, router } = await startActor({}, new Error("down"));

    await actor.handleMessage(command({ userId: "u1", chatId: 7, text: "hello" }));

    expect(router.sent[0]?.message.messageType).toBe("error");
    expect(router.sent[0]?.message.payload).toEqual({
      userId: "u1",
      chatId: 7,
      error: "fake call failed: down",
      errorType: "generation_error",
    });
  });

  it("sends an error message when the bot_response cannot be delivered", async () => {
    const { actor, router } = await startActor({}, '{"response":"hi there"}');
    router.failures = 1;

    await expect(
      actor.handleMessage(command({ userId: "u1", chatId: 7, text: "hello" }))
    ).resolves.toBeNull();

    expect(router.sent).toHaveLength(1);
    expect(router.sent[0]?.message.messageType).toBe("error");
    expect(router.sent[0]?.message.payload).toEqual({
      userId: "u1",
      chatId: 7,
      error: "transport down",
      errorType: "generation_error",
    });
  });

  it("tells the user to retry later while the breaker is open", async () => {
    const { actor, router } = await startActor(
      { CIRCUIT_BREAKER_FAILURE_THRESHOLD: "1" },
      new Error("down")
    );

    await actor.handleMessage(command({ userId: "u1", chatId: 7, text: "first" }));
    await actor.handleMessage(command({ userId: "u1", chatId: 7, text: "second" }));

    expect(router.sent[1]?.message.payload.error).toBe(
      "The assistant is temporarily unavailable. Please try again in a minute."
    );
  });

  it("requires initialize() before handling commands", async () => {
    const actor = new GenerationActor({ router: new RecordingRouter(), provider: new FakeProvider("x") });

    await expect(
      actor.handleMessage(command({ userId: "u1", chatId: 1, text: "hello" }))
    ).rejects.toThrow("GenerationActor is not initialized");
  });

  it("fails to initialize the OpenAI provider without an API key", async () => {
    vi.stubEnv("LLM_PROVIDER", "openai");
    vi.stubEnv("LLM_API_KEY", "");
    _resetConfigCache();

    const actor = new GenerationActor({ router: new RecordingRouter(), config: getConfig() });

    await expect(actor.initialize()).rejects.toThrow(
      "LLM_API_KEY (or DEEPSEEK_API_KEY) is required when LLM_PROVIDER=openai"
    );
  });

  it("closes the provider on shutdown", async () => {
    const { actor, provider } = await startActor({}, '{"response":"x"}');

    await actor.shutdown();

    expect(provider.closed).toBe(true);
  });
});
