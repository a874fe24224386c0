/**
 * @p4mcp/perforce
 *
 * Perforce operations exposed as tools.
 */

// Core exports
export * from "./core/index.js";

// Backends
export * from "./infrastructure/index.js";
export { createBackend } from "./backend.js";

// Configuration
export { type P4ServerConfig, type CliOptions, type Environment, resolveConfig, isFlagSet } from "./config.js";
export { SERVER_NAME, SERVER_VERSION, createProgram, parseCli } from "./cli.js";

// Tool exports
export { registerAllTools, type ToolRegistrar } from "./tools/index.js";
