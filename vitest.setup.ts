/**
 * Vitest Global Setup
 *
 * Runs before each test file. Resets the config cache so tests can use
 * vi.stubEnv() and have it picked up by the config module.
 */

import { beforeEach } from "vitest";
import { _resetConfigCache } from "./src/config/index.js";

// Keep test output readable; tests assert on injected loggers instead
process.env.LOG_LEVEL ??= "silent";

beforeEach(() => {
  _resetConfigCache();
});
