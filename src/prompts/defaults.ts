/**
 * Default Prompt Registry
 *
 * Built-in system prompts per mode and phase. `json` variants are used for
 * the structured phase, `normal` variants for the plain-text fallback.
 * A modifier containing the placeholder marker is treated as unregistered.
 */

import type { GenerationMode } from "../config/modes.js";

export const PLACEHOLDER_MARKER = "TODO";

export interface PromptVariants {
  json: string;
  normal: string;
}

export interface PromptRegistry {
  /** Base prompt, always first in the system message */
  base: PromptVariants;
  /** Mode modifiers appended after the base prompt */
  modifiers: Partial<Record<GenerationMode, Partial<PromptVariants>>>;
  /** Structure instructions appended in the structured phase */
  schemaInstructions: Partial<Record<GenerationMode, string>>;
}

// ============================================================================
// Base prompt
// ============================================================================

const BASE_PERSONA = `You are a thoughtful conversational assistant. You answer in the language the user writes in, stay honest about what you do not know, and keep a calm, curious tone.`;

const BASE_JSON_PROMPT = `${BASE_PERSONA}

Respond ONLY with a single JSON object. The object MUST contain a "response" field holding your full reply as a string. You may add these optional fields:
- "emotional_tone": one or two words describing the tone of your reply
- "engagement_level": a number between 0 and 1

Do not wrap the JSON in markdown and do not add any text outside it.`;

const BASE_NORMAL_PROMPT = `${BASE_PERSONA}

Reply in plain text. Do not use JSON.`;

// ============================================================================
// Mode modifiers
// ============================================================================

const TALK_MODIFIER = `Mode: conversation. Keep replies short and personal, mirror the user's register, and ask a natural follow-up question when the conversation invites one.`;

const EXPERT_MODIFIER = `Mode: expert. Answer precisely and in depth. Structure the answer, name trade-offs and state your confidence honestly. Prefer established knowledge over speculation.`;

const CREATIVE_MODIFIER = `Mode: creative. Play with imagery, rhythm and unexpected associations. Favour vivid language over exhaustive explanation.`;

// ============================================================================
// Structure instructions (structured phase only)
// ============================================================================

const TALK_SCHEMA = `JSON fields for this mode:
- "response" (string, required)
- "emotional_tone" (string, required)
- "engagement_level" (number 0..1, required)
- "follow_up" (string, optional): the follow-up question, if you asked one`;

const EXPERT_SCHEMA = `JSON fields for this mode:
- "response" (string, required)
- "topic" (string, required): the subject area of the question
- "confidence" (number 0..1, required)
- "key_points" (array of strings, at least one, required)
- "sources" (array of strings, optional)`;

const CREATIVE_SCHEMA = `JSON fields for this mode:
- "response" (string, required)
- "style" (string, required): the style you wrote in
- "imagery" (array of strings, required): the central images you used
- "mood" (string, optional)`;

export const DEFAULT_PROMPTS: PromptRegistry = {
  base: {
    json: BASE_JSON_PROMPT,
    normal: BASE_NORMAL_PROMPT,
  },
  modifiers: {
    talk: { json: TALK_MODIFIER, normal: TALK_MODIFIER },
    expert: { json: EXPERT_MODIFIER, normal: EXPERT_MODIFIER },
    creative: { json: CREATIVE_MODIFIER, normal: CREATIVE_MODIFIER },
  },
  schemaInstructions: {
    talk: TALK_SCHEMA,
    expert: EXPERT_SCHEMA,
    creative: CREATIVE_SCHEMA,
  },
};
