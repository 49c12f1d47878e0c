/**
 * Provider router.
 *
 * Selects the streaming provider from LLM_PROVIDER:
 * - openai: OpenAI-compatible endpoint (DeepSeek by default), needs an API key
 * - fixtures: offline echo provider
 */

import { config, type Config } from "../../config/index.js";
import { log } from "../../utils/telemetry.js";
import { FixturesChatProvider } from "./fixtures.js";
import { OpenAIChatProvider } from "./openai.js";
import type { StreamingChatProvider } from "./types.js";

export function createProvider(llm: Config["llm"] = config.llm): StreamingChatProvider {
  let provider: StreamingChatProvider;

  switch (llm.provider) {
    case "openai": {
      if (!llm.apiKey) {
        throw new Error("LLM_API_KEY (or DEEPSEEK_API_KEY) is required when LLM_PROVIDER=openai");
      }
      provider = new OpenAIChatProvider({
        apiKey: llm.apiKey,
        baseUrl: llm.baseUrl,
        model: llm.model,
        timeoutMs: llm.timeoutMs,
      });
      break;
    }
    case "fixtures":
      provider = new FixturesChatProvider();
      break;
    default:
      throw new Error(`Unknown provider: ${String(llm.provider)}`);
  }

  log.info({ provider: provider.name, model: provider.model }, "Created LLM provider");
  return provider;
}
