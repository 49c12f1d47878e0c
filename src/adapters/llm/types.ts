/**
 * Provider-agnostic streaming chat interface.
 *
 * Every provider (OpenAI-compatible endpoint, offline fixtures) implements
 * StreamingChatProvider so the generation pipeline never sees SDK types.
 */

import type { ModeParameters } from "../../config/modes.js";

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ChatStreamRequest {
  messages: ChatMessage[];
  /** Sampling parameters resolved for the request's mode */
  params: ModeParameters;
  /** Request a JSON object response (`response_format: json_object`) */
  jsonMode: boolean;
}

/**
 * Prompt-cache telemetry reported by the provider. Values are cumulative
 * for the whole request, not per-chunk deltas.
 */
export interface CacheUsage {
  promptCacheHitTokens: number;
  promptCacheMissTokens: number;
}

/**
 * One incremental piece of a streamed response.
 */
export interface StreamChunk {
  content?: string;
  usage?: CacheUsage;
}

export interface StreamingChatProvider {
  readonly name: string;
  readonly model: string;

  /**
   * Start a streaming completion. The returned iterable is finite and can
   * be consumed once.
   */
  streamChat(request: ChatStreamRequest): Promise<AsyncIterable<StreamChunk>>;

  /** Release SDK resources, if any */
  close?(): Promise<void>;
}
