/**
 * p4_status tool - List files opened in the workspace.
 */

import { DepotPathSchema } from "./schemas.js";
import type { ToolRegistrar } from "./types.js";

export const registerP4Status: ToolRegistrar = (registry) => {
  registry.registerTool(
    "p4_status",
    {
      title: "P4 status",
      description: "Show opened files in the workspace (runs `p4 opened`), optionally limited to a path.",
      inputSchema: {
        path: DepotPathSchema.optional().describe("Depot or local path to check (default: whole workspace)"),
      },
    },
    (args) => args.finish({ kind: "status", path: args.optionalString("path") })
  );
};
