#!/usr/bin/env node
/**
 * Perforce tool server over stdio.
 */

import { createLogger, runServer } from "@p4mcp/core";

import { createBackend } from "./backend.js";
import { SERVER_NAME, SERVER_VERSION, parseCli } from "./cli.js";
import type { P4Command } from "./core/model.js";
import { registerAllTools } from "./tools/index.js";

const parsed = parseCli(process.argv, process.env);
if (!parsed.ok) {
  console.error(`[${SERVER_NAME}] ${parsed.error}`);
  process.exit(2);
}

const config = parsed.value;
const logger = createLogger(SERVER_NAME, { level: config.debug ? "debug" : "info" });

runServer<P4Command>({
  config: { name: SERVER_NAME, version: SERVER_VERSION },
  createBackend: () => createBackend(config, logger),
  registerTools: registerAllTools,
  argumentPolicy: config.argumentPolicy,
  logger,
  onStartup: (backend) => {
    logger.debug(
      backend.name === "mock"
        ? "Mock mode: p4 is never run"
        : `Running ${config.binary} with a ${config.timeoutMs}ms timeout${config.cwd ? ` in ${config.cwd}` : ""}`
    );
  },
});
