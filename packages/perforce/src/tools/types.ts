/**
 * Shared types for p4 tool registration.
 */

import type { ToolRegistry } from "@p4mcp/core";
import type { P4Command } from "../core/model.js";

/**
 * Function type for registering a tool with the registry.
 */
export interface ToolRegistrar {
  (registry: ToolRegistry<P4Command>): void;
}
