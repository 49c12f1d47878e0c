/**
 * Generation Actor
 *
 * Handles `generate_response` commands: runs the orchestrator and sends a
 * `bot_response` (or an `error` message) to the chat transport. Other
 * message types are ignored.
 */

import { config as appConfig, type Config } from "../config/index.js";
import { createProvider } from "../adapters/llm/router.js";
import type { StreamingChatProvider } from "../adapters/llm/types.js";
import { describeGenerationFailure } from "../utils/errors.js";
import { log } from "../utils/telemetry.js";
import type { EventSink } from "./events.js";
import {
  createActorMessage,
  GenerateResponseSchema,
  MessageTypes,
  type ActorMessage,
  type BotResponsePayload,
  type ErrorPayload,
  type MessageRouter,
} from "./messages.js";
import {
  createGenerationOrchestrator,
  createGenerationRequest,
  type GenerationOrchestrator,
} from "./orchestrator.js";

export const TRANSPORT_RECIPIENT = "telegram";

const PREVIEW_LENGTH = 50;

export interface GenerationActorOptions {
  router: MessageRouter;
  sink?: EventSink;
  /** Provider override; defaults to the one selected by LLM_PROVIDER */
  provider?: StreamingChatProvider;
  config?: Config;
}

export class GenerationActor {
  readonly name = "generation";
  private orchestrator: GenerationOrchestrator | null = null;

  constructor(private readonly options: GenerationActorOptions) {}

  /**
   * Build the provider and orchestrator. Throws when the configured provider
   * cannot be created (e.g. missing API key).
   */
  async initialize(): Promise<void> {
    const cfg = this.options.config ?? appConfig;
    const provider = this.options.provider ?? createProvider(cfg.llm);
    this.orchestrator = createGenerationOrchestrator({
      provider,
      sink: this.options.sink,
      config: cfg,
    });
    log.info({ actor: this.name, provider: provider.name, model: provider.model }, "GenerationActor initialized");
  }

  getOrchestrator(): GenerationOrchestrator {
    if (!this.orchestrator) {
      throw new Error("GenerationActor is not initialized");
    }
    return this.orchestrator;
  }

  async handleMessage(message: ActorMessage): Promise<ActorMessage | null> {
    if (message.messageType !== MessageTypes.GenerateResponse) {
      return null;
    }

    const parsed = GenerateResponseSchema.safeParse(message.payload);
    if (!parsed.success) {
      log.warn(
        { actor: this.name, message_id: message.messageId, issues: parsed.error.issues.length },
        "Ignoring malformed generate_response command"
      );
      return null;
    }

    const command = parsed.data;
    const orchestrator = this.getOrchestrator();
    log.info({ user_id: command.userId, mode: command.mode ?? "base" }, "Generating response");

    try {
      const text = await orchestrator.generate(
        createGenerationRequest({
          userId: command.userId,
          text: command.text,
          mode: command.mode,
          includePrompt: command.includePrompt,
        })
      );
      log.info(
        { user_id: command.userId, preview: text.slice(0, PREVIEW_LENGTH) },
        "Generated response"
      );

      const payload: BotResponsePayload = {
        userId: command.userId,
        chatId: command.chatId,
        text,
        generatedAt: new Date().toISOString(),
      };
      await this.options.router.sendMessage(
        TRANSPORT_RECIPIENT,
        createActorMessage(this.name, MessageTypes.BotResponse, payload)
      );
    } catch (error) {
      // Covers both a failed generation and a failed bot_response delivery
      log.error({ user_id: command.userId, error }, "Generation failed");

      const payload: ErrorPayload = {
        userId: command.userId,
        chatId: command.chatId,
        error: describeGenerationFailure(error),
        errorType: "generation_error",
      };
      await this.options.router.sendMessage(
        TRANSPORT_RECIPIENT,
        createActorMessage(this.name, MessageTypes.Error, payload)
      );
    }

    return null;
  }

  async shutdown(): Promise<void> {
    if (!this.orchestrator) {
      return;
    }
    await this.orchestrator.shutdown();
    this.orchestrator = null;
    log.info({ actor: this.name }, "GenerationActor shut down");
  }
}
