import type { ExecutionBackend } from "@p4mcp/core";
import type { ExecutionError, P4Command } from "../model.js";

/**
 * Runs a p4 command and returns its text output.
 */
export type P4Backend = ExecutionBackend<P4Command, ExecutionError>;
