/**
 * Prompt Composer
 *
 * Builds the ordered chat messages for one provider call:
 *   [system prompt]  (only when includePrompt)
 *   [history]        (reserved, currently empty)
 *   user message     (always last)
 *
 * System prompt = base prompt for the phase, then the mode modifier, then
 * (structured phase only) the mode's schema instructions, separated by blank
 * lines. Unknown modes and placeholder modifiers fall back to the base prompt.
 */

import { resolveMode } from "../config/modes.js";
import { log } from "../utils/telemetry.js";
import { DEFAULT_PROMPTS, PLACEHOLDER_MARKER, type PromptRegistry } from "./defaults.js";
import type { ChatMessage } from "../adapters/llm/types.js";

export type PromptPhase = "structured" | "fallback";

export class PromptComposer {
  constructor(private readonly prompts: PromptRegistry = DEFAULT_PROMPTS) {}

  compose(text: string, includePrompt: boolean, mode: string, phase: PromptPhase): ChatMessage[] {
    const messages: ChatMessage[] = [];

    if (includePrompt) {
      messages.push({ role: "system", content: this.buildSystemPrompt(mode, phase) });
    }

    messages.push(...this.historyFor(mode));

    messages.push({ role: "user", content: text });
    return messages;
  }

  buildSystemPrompt(mode: string, phase: PromptPhase): string {
    const variant = phase === "structured" ? "json" : "normal";
    const basePrompt = this.prompts.base[variant];

    if (mode === "base") {
      return basePrompt;
    }

    const known = resolveMode(mode);
    if (known !== mode) {
      log.warn({ mode }, "Unknown generation mode, falling back to base prompt");
      return basePrompt;
    }

    const modifier = this.prompts.modifiers[known]?.[variant] ?? "";
    if (!modifier.trim() || modifier.includes(PLACEHOLDER_MARKER)) {
      log.debug({ mode, phase }, "No usable modifier for mode, using base prompt");
      return basePrompt;
    }

    let prompt = `${basePrompt}\n\n${modifier}`;

    const schemaInstruction = this.prompts.schemaInstructions[known];
    if (phase === "structured" && schemaInstruction) {
      prompt += `\n\n${schemaInstruction}`;
    }

    return prompt;
  }

  /**
   * Conversation history for the request. Memory injection is not wired in
   * yet; always empty.
   */
  private historyFor(_mode: string): ChatMessage[] {
    return [];
  }
}
