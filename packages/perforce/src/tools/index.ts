/**
 * Tool registration for the perforce package.
 */

import type { ToolRegistry } from "@p4mcp/core";
import type { P4Command } from "../core/model.js";

// Read operations
import { registerP4Status } from "./p4Status.js";
import { registerP4Opened } from "./p4Opened.js";
import { registerP4Changes } from "./p4Changes.js";
import { registerP4Info } from "./p4Info.js";

// Write operations
import { registerP4Sync } from "./p4Sync.js";
import { registerP4Edit } from "./p4Edit.js";
import { registerP4Add } from "./p4Add.js";
import { registerP4Submit } from "./p4Submit.js";
import { registerP4Revert } from "./p4Revert.js";

/**
 * Register every p4 tool. Registration order is the order tools/list reports.
 */
export function registerAllTools(registry: ToolRegistry<P4Command>): void {
  registerP4Status(registry);
  registerP4Sync(registry);
  registerP4Edit(registry);
  registerP4Add(registry);
  registerP4Submit(registry);
  registerP4Revert(registry);
  registerP4Opened(registry);
  registerP4Changes(registry);
  registerP4Info(registry);
}

export * from "./types.js";
