/**
 * Structured Response Schemas
 *
 * Zod schemas for the JSON object the model returns in the structured phase,
 * one per generation mode. Unknown keys pass through: the model may add
 * fields we do not read.
 */

import { z } from "zod";
import type { GenerationMode } from "../config/modes.js";

// ---------------------------------------------------------------------------
// Base
// ---------------------------------------------------------------------------

const Score = z.number().min(0).max(1);

export const BaseResponseSchema = z
  .object({
    response: z.string().min(1, "response must not be empty"),
    emotional_tone: z.string().optional(),
    engagement_level: Score.optional(),
  })
  .passthrough();

// ---------------------------------------------------------------------------
// Mode extensions
// ---------------------------------------------------------------------------

export const TalkResponseSchema = BaseResponseSchema.extend({
  emotional_tone: z.string(),
  engagement_level: Score,
  follow_up: z.string().optional(),
});

export const ExpertResponseSchema = BaseResponseSchema.extend({
  topic: z.string(),
  confidence: Score,
  key_points: z.array(z.string().min(1)).min(1),
  sources: z.array(z.string()).optional(),
});

export const CreativeResponseSchema = BaseResponseSchema.extend({
  style: z.string(),
  imagery: z.array(z.string()),
  mood: z.string().optional(),
});

export function schemaForMode(mode: GenerationMode): z.ZodTypeAny {
  switch (mode) {
    case "talk":
      return TalkResponseSchema;
    case "expert":
      return ExpertResponseSchema;
    case "creative":
      return CreativeResponseSchema;
    case "base":
    default:
      return BaseResponseSchema;
  }
}
