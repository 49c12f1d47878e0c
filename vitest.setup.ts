/**
 * Vitest Global Setup
 *
 * Resets the config cache before each test file and each test, so tests can
 * use vi.stubEnv() to set environment variables that the config module
 * picks up on next access.
 */

import { beforeAll, beforeEach } from "vitest";
import { _resetConfigCache } from "./src/config/index.js";

// Tests never reach a real provider
process.env.LLM_PROVIDER ??= "fixtures";
process.env.LOG_LEVEL ??= "silent";

beforeAll(() => {
  _resetConfigCache();
});

beforeEach(() => {
  _resetConfigCache();
});
