/**
 * Generation modes and their sampling parameters.
 *
 * A mode is a named persona selecting prompt modifiers and a parameter set.
 * Lookups are total: anything outside GENERATION_MODES resolves to "base".
 */

import { z } from "zod";

export const GENERATION_MODES = ["base", "talk", "expert", "creative"] as const;

export type GenerationMode = (typeof GENERATION_MODES)[number];

export const DEFAULT_MODE: GenerationMode = "base";

export interface ModeParameters {
  temperature: number;
  topP: number;
  maxTokens: number;
  frequencyPenalty: number;
  presencePenalty: number;
}

export const DEFAULT_MODE_PARAMETERS: Readonly<Record<GenerationMode, Readonly<ModeParameters>>> = {
  base: {
    temperature: 0.82,
    topP: 0.85,
    maxTokens: 1800,
    frequencyPenalty: 0.4,
    presencePenalty: 0.65,
  },
  // Conversational: warmer, shorter turns
  talk: {
    temperature: 0.9,
    topP: 0.9,
    maxTokens: 1200,
    frequencyPenalty: 0.3,
    presencePenalty: 0.6,
  },
  // Precise, longer answers
  expert: {
    temperature: 0.5,
    topP: 0.8,
    maxTokens: 2500,
    frequencyPenalty: 0.2,
    presencePenalty: 0.3,
  },
  creative: {
    temperature: 1.0,
    topP: 0.95,
    maxTokens: 2000,
    frequencyPenalty: 0.5,
    presencePenalty: 0.8,
  },
};

/**
 * Normalise a raw mode string. Unknown or missing modes become "base".
 */
export function resolveMode(raw: string | undefined | null): GenerationMode {
  switch (raw) {
    case "base":
    case "talk":
    case "expert":
    case "creative":
      return raw;
    default:
      return DEFAULT_MODE;
  }
}

export function isGenerationMode(raw: string): raw is GenerationMode {
  return resolveMode(raw) === raw;
}

const PartialModeParameters = z
  .object({
    temperature: z.number().min(0).max(2),
    topP: z.number().min(0).max(1),
    maxTokens: z.number().int().positive(),
    frequencyPenalty: z.number().min(-2).max(2),
    presencePenalty: z.number().min(-2).max(2),
  })
  .strict()
  .partial();

const ModeParameterOverrides = z
  .object({
    base: PartialModeParameters,
    talk: PartialModeParameters,
    expert: PartialModeParameters,
    creative: PartialModeParameters,
  })
  .strict()
  .partial();

export type ModeParameterOverrides = z.infer<typeof ModeParameterOverrides>;

/**
 * Mode → parameter lookup with default-to-base fallback.
 */
export class ModeParameterTable {
  private readonly table: Record<GenerationMode, Readonly<ModeParameters>>;

  constructor(overrides: ModeParameterOverrides = {}) {
    this.table = {
      base: Object.freeze({ ...DEFAULT_MODE_PARAMETERS.base, ...overrides.base }),
      talk: Object.freeze({ ...DEFAULT_MODE_PARAMETERS.talk, ...overrides.talk }),
      expert: Object.freeze({ ...DEFAULT_MODE_PARAMETERS.expert, ...overrides.expert }),
      creative: Object.freeze({ ...DEFAULT_MODE_PARAMETERS.creative, ...overrides.creative }),
    };
  }

  /**
   * Build a table from the raw MODE_PARAMS_JSON object. Throws a ZodError
   * for unknown modes, unknown fields or out-of-range values.
   */
  static fromConfig(raw: Record<string, unknown> | undefined): ModeParameterTable {
    return new ModeParameterTable(raw ? ModeParameterOverrides.parse(raw) : {});
  }

  resolve(mode: string): Readonly<ModeParameters> {
    return this.table[resolveMode(mode)];
  }

  entries(): Array<[GenerationMode, Readonly<ModeParameters>]> {
    return GENERATION_MODES.map((mode) => [mode, this.table[mode]]);
  }
}
