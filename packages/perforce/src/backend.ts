import type { Logger } from "@p4mcp/core";

import type { P4Backend } from "./core/ports/index.js";
import type { P4ServerConfig } from "./config.js";
import { MockBackend } from "./infrastructure/mock/MockBackend.js";
import { P4Executor } from "./infrastructure/runner/P4Executor.js";

/**
 * Pick the backend for the lifetime of the server.
 */
export function createBackend(config: P4ServerConfig, logger: Logger): P4Backend {
  if (config.mock) {
    return new MockBackend();
  }
  return new P4Executor({
    binary: config.binary,
    timeoutMs: config.timeoutMs,
    cwd: config.cwd,
    logger,
  });
}
