/**
 * Centralized Configuration Module
 *
 * Provides type-safe, validated access to all environment variables.
 * Replaces scattered `process.env` usage throughout the codebase.
 *
 * Invalid configuration fails on first access with a ZodError.
 */

import { z } from "zod";

/**
 * Custom boolean coercion that handles string "false" and "true"
 */
const booleanString = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    if (typeof val === "number") return val !== 0;
    const lower = val.toLowerCase().trim();
    if (lower === "false" || lower === "0" || lower === "") return false;
    if (lower === "true" || lower === "1") return true;
    return Boolean(val); // fallback
  });

/**
 * Optional JSON object string (e.g. MODE_PARAMS_JSON).
 * Empty/undefined means "no overrides".
 */
const optionalJsonObject = z
  .union([z.string(), z.undefined()])
  .transform((val, ctx): Record<string, unknown> | undefined => {
    if (val === undefined || val.trim() === "") {
      return undefined;
    }
    try {
      const parsed: unknown = JSON.parse(val);
      if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
        return Object.fromEntries(Object.entries(parsed));
      }
    } catch {
      // reported below
    }
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "Expected a JSON object",
    });
    return z.NEVER;
  });

/**
 * Environment enum
 */
const Environment = z.enum(["development", "test", "production"]);

/**
 * LLM Provider enum
 */
const LLMProvider = z.enum(["openai", "fixtures"]);

/**
 * Log Level enum
 */
const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

/**
 * Configuration Schema
 */
const ConfigSchema = z.object({
  // Server Configuration
  server: z.object({
    port: z.coerce.number().int().positive().default(3101),
    nodeEnv: Environment.default("development"),
    logLevel: LogLevel.default("info"),
    infoSampleRate: z.coerce.number().min(0).max(1).default(0.1),
    logStack: booleanString.default(false),
  }),

  // LLM provider (OpenAI-compatible streaming endpoint, DeepSeek by default)
  llm: z.object({
    provider: LLMProvider.default("openai"),
    apiKey: z.string().optional(),
    baseUrl: z.string().url().default("https://api.deepseek.com"),
    model: z.string().min(1).default("deepseek-chat"),
    timeoutMs: z.coerce.number().int().positive().default(60_000),
  }),

  // Circuit breaker guarding the provider endpoint
  breaker: z.object({
    failureThreshold: z.coerce.number().int().positive().default(3),
    recoveryTimeoutMs: z.coerce.number().int().positive().default(60_000),
  }),

  // Generation protocol
  generation: z.object({
    structuredEnabled: booleanString.default(true),
    fallbackEnabled: booleanString.default(true),
    logParametersUsage: booleanString.default(true),
    logResponseLength: booleanString.default(true),
    debugModeSelection: booleanString.default(false),
    modeParams: optionalJsonObject,
  }),

  // Advisory schema validation of structured payloads
  validation: z.object({
    enabled: booleanString.default(true),
    logFailures: booleanString.default(true),
    maxErrors: z.coerce.number().int().positive().default(5),
  }),

  // Metrics logging
  metrics: z.object({
    cacheHitLogInterval: z.coerce.number().int().positive().default(10),
  }),

  // Observability event side channel
  events: z.object({
    appendTimeoutMs: z.coerce.number().int().positive().default(5_000),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse and validate configuration from environment variables
 */
function parseConfig(): Config {
  const env = process.env;

  const rawConfig = {
    server: {
      port: env.PORT,
      nodeEnv: env.NODE_ENV,
      logLevel: env.LOG_LEVEL,
      infoSampleRate: env.INFO_SAMPLE_RATE,
      logStack: env.LOG_STACK,
    },
    llm: {
      provider: env.LLM_PROVIDER,
      // LLM_API_KEY preferred; falls back to DEEPSEEK_API_KEY
      apiKey: env.LLM_API_KEY ?? env.DEEPSEEK_API_KEY,
      baseUrl: env.LLM_BASE_URL,
      model: env.LLM_MODEL,
      timeoutMs: env.LLM_TIMEOUT_MS,
    },
    breaker: {
      failureThreshold: env.CIRCUIT_BREAKER_FAILURE_THRESHOLD,
      recoveryTimeoutMs: env.CIRCUIT_BREAKER_RECOVERY_TIMEOUT_MS,
    },
    generation: {
      structuredEnabled: env.USE_JSON_MODE,
      fallbackEnabled: env.JSON_FALLBACK_ENABLED,
      logParametersUsage: env.LOG_PARAMETERS_USAGE,
      logResponseLength: env.LOG_RESPONSE_LENGTH,
      debugModeSelection: env.DEBUG_MODE_SELECTION,
      modeParams: env.MODE_PARAMS_JSON,
    },
    validation: {
      enabled: env.JSON_VALIDATION_ENABLED,
      logFailures: env.JSON_VALIDATION_LOG_FAILURES,
      maxErrors: env.JSON_VALIDATION_MAX_ERRORS,
    },
    metrics: {
      cacheHitLogInterval: env.CACHE_HIT_LOG_INTERVAL,
    },
    events: {
      appendTimeoutMs: env.EVENT_APPEND_TIMEOUT_MS,
    },
  };

  return ConfigSchema.parse(rawConfig);
}

/**
 * Lazy configuration singleton.
 *
 * The config is parsed once on first access and cached thereafter.
 */
let _cachedConfig: Config | null = null;

function loadConfig(): Config {
  if (_cachedConfig === null) {
    _cachedConfig = parseConfig();
  }
  return _cachedConfig;
}

export const config: Config = {
  get server() {
    return loadConfig().server;
  },
  get llm() {
    return loadConfig().llm;
  },
  get breaker() {
    return loadConfig().breaker;
  },
  get generation() {
    return loadConfig().generation;
  },
  get validation() {
    return loadConfig().validation;
  },
  get metrics() {
    return loadConfig().metrics;
  },
  get events() {
    return loadConfig().events;
  },
};

/**
 * Get configuration (for compatibility and testing)
 */
export function getConfig(): Config {
  return loadConfig();
}

/**
 * Reset cached configuration (for testing only)
 *
 * Clears the cached configuration and forces a fresh parse on next access,
 * so tests can change environment variables with vi.stubEnv().
 *
 * @internal
 */
export function _resetConfigCache(): void {
  _cachedConfig = null;
}
