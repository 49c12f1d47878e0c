import { randomUUID } from "node:crypto";
import { z } from "zod";

/**
 * Message types understood by the generation actor and its peers
 */
export const MessageTypes = {
  GenerateResponse: "generate_response",
  BotResponse: "bot_response",
  Error: "error",
} as const;

export interface ActorMessage<P extends Record<string, unknown> = Record<string, unknown>> {
  readonly messageId: string;
  readonly senderId: string | null;
  readonly messageType: string;
  readonly payload: P;
  /** ISO-8601 */
  readonly timestamp: string;
}

export function createActorMessage<P extends Record<string, unknown>>(
  senderId: string | null,
  messageType: string,
  payload: P
): ActorMessage<P> {
  return Object.freeze({
    messageId: randomUUID(),
    senderId,
    messageType,
    payload,
    timestamp: new Date().toISOString(),
  });
}

const ChatId = z.union([z.string().min(1), z.number().int()]);

export const GenerateResponseSchema = z.object({
  userId: z.string().min(1),
  chatId: ChatId,
  text: z.string(),
  includePrompt: z.boolean().default(true),
  mode: z.string().optional(),
});

export type BotResponsePayload = {
  userId: string;
  chatId: string | number;
  text: string;
  generatedAt: string;
};

export type ErrorPayload = {
  userId: string;
  chatId: string | number;
  error: string;
  errorType: "generation_error";
};

/**
 * Delivery seam to other actors (mailbox dispatch lives outside this service)
 */
export interface MessageRouter {
  sendMessage(recipient: string, message: ActorMessage): Promise<void>;
}
