import OpenAI from "openai";
import type {
  ChatCompletionChunk,
  ChatCompletionMessageParam,
} from "openai/resources/chat/completions";
import { log } from "../../utils/telemetry.js";
import type {
  CacheUsage,
  ChatMessage,
  ChatStreamRequest,
  StreamChunk,
  StreamingChatProvider,
} from "./types.js";
import { ProviderError, UpstreamHTTPError, UpstreamTimeoutError } from "./errors.js";

export interface OpenAIProviderOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;
}

type ChunkUsage = NonNullable<ChatCompletionChunk["usage"]>;

function toOpenAIMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
    case "user":
    default:
      return { role: "user", content: message.content };
  }
}

/**
 * Read prompt-cache counters from a usage block.
 *
 * DeepSeek reports `prompt_cache_hit_tokens` / `prompt_cache_miss_tokens`;
 * OpenAI reports `prompt_tokens_details.cached_tokens`.
 */
export function readCacheUsage(usage: ChunkUsage | null | undefined): CacheUsage | undefined {
  if (!usage) {
    return undefined;
  }

  if ("prompt_cache_hit_tokens" in usage || "prompt_cache_miss_tokens" in usage) {
    const hit = "prompt_cache_hit_tokens" in usage ? usage.prompt_cache_hit_tokens : 0;
    const miss = "prompt_cache_miss_tokens" in usage ? usage.prompt_cache_miss_tokens : 0;
    return {
      promptCacheHitTokens: typeof hit === "number" ? hit : 0,
      promptCacheMissTokens: typeof miss === "number" ? miss : 0,
    };
  }

  const cached = usage.prompt_tokens_details?.cached_tokens ?? 0;
  return {
    promptCacheHitTokens: cached,
    promptCacheMissTokens: Math.max(0, usage.prompt_tokens - cached),
  };
}

/**
 * OpenAI-compatible streaming provider (DeepSeek by default).
 *
 * SDK retries are disabled: a failed call is reported once to the circuit
 * breaker and never retried locally.
 */
export class OpenAIChatProvider implements StreamingChatProvider {
  readonly name = "openai";
  readonly model: string;
  private readonly client: OpenAI;
  private readonly timeoutMs: number;

  constructor(options: OpenAIProviderOptions) {
    this.model = options.model;
    this.timeoutMs = options.timeoutMs;
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
  }

  async streamChat(request: ChatStreamRequest): Promise<AsyncIterable<StreamChunk>> {
    const startTime = Date.now();
    const { params } = request;

    log.debug(
      {
        provider: this.name,
        model: this.model,
        message_count: request.messages.length,
        json_mode: request.jsonMode,
      },
      "Starting streaming completion"
    );

    try {
      const stream = await this.client.chat.completions.create({
        model: this.model,
        messages: request.messages.map(toOpenAIMessage),
        temperature: params.temperature,
        top_p: params.topP,
        max_tokens: params.maxTokens,
        frequency_penalty: params.frequencyPenalty,
        presence_penalty: params.presencePenalty,
        stream: true,
        stream_options: { include_usage: true },
        ...(request.jsonMode ? { response_format: { type: "json_object" as const } } : {}),
      });
      return this.toChunks(stream, startTime);
    } catch (error) {
      throw this.mapError(error, startTime);
    }
  }

  private async *toChunks(
    stream: AsyncIterable<ChatCompletionChunk>,
    startTime: number
  ): AsyncGenerator<StreamChunk> {
    try {
      for await (const chunk of stream) {
        const content = chunk.choices[0]?.delta?.content ?? undefined;
        const usage = readCacheUsage(chunk.usage);
        if (content === undefined && usage === undefined) {
          continue;
        }
        yield { content, usage };
      }
    } catch (error) {
      throw this.mapError(error, startTime);
    }
  }

  private mapError(error: unknown, startTime: number): ProviderError {
    const elapsedMs = Date.now() - startTime;

    if (error instanceof OpenAI.APIConnectionTimeoutError) {
      return new UpstreamTimeoutError(
        `${this.name} request timed out after ${elapsedMs}ms`,
        this.name,
        this.timeoutMs,
        elapsedMs,
        { cause: error }
      );
    }

    if (error instanceof OpenAI.APIError && typeof error.status === "number") {
      return new UpstreamHTTPError(
        `${this.name} returned HTTP ${error.status}: ${error.message}`,
        this.name,
        error.status,
        error.code ?? undefined,
        error.headers?.["x-request-id"] ?? undefined,
        elapsedMs,
        { cause: error }
      );
    }

    return ProviderError.from(error, this.name, elapsedMs);
  }
}
