/**
 * Offline provider for local runs without an API key.
 *
 * Echoes the last user message back, word by word. When JSON mode is
 * requested the echo is wrapped as `{"response": ...}` so the structured
 * phase succeeds.
 */

import type {
  ChatStreamRequest,
  StreamChunk,
  StreamingChatProvider,
} from "./types.js";

const EMPTY_PROMPT_REPLY = "(empty message)";

export class FixturesChatProvider implements StreamingChatProvider {
  readonly name = "fixtures";
  readonly model = "fixture-v1";

  async streamChat(request: ChatStreamRequest): Promise<AsyncIterable<StreamChunk>> {
    const lastUser = [...request.messages].reverse().find((m) => m.role === "user");
    const echo = lastUser?.content.trim() || EMPTY_PROMPT_REPLY;
    const body = request.jsonMode ? JSON.stringify({ response: echo }) : echo;
    const promptChars = request.messages.reduce((sum, m) => sum + m.content.length, 0);

    return fixtureStream(body, promptChars);
  }
}

async function* fixtureStream(body: string, promptChars: number): AsyncGenerator<StreamChunk> {
  // Split on spaces but keep them, so concatenation reproduces the body
  for (const piece of body.split(/(?<= )/)) {
    yield { content: piece };
  }
  // Rough token estimate; fixtures never hit a cache
  yield {
    usage: {
      promptCacheHitTokens: 0,
      promptCacheMissTokens: Math.ceil(promptChars / 4),
    },
  };
}
