/**
 * p4_changes tool - List recent submitted changelists.
 */

import { DEFAULT_CHANGES_MAX, DepotPathSchema, MaxChangesSchema } from "./schemas.js";
import type { ToolRegistrar } from "./types.js";

export const registerP4Changes: ToolRegistrar = (registry) => {
  registry.registerTool(
    "p4_changes",
    {
      title: "P4 changes",
      description: "Show recent changelists, newest first.",
      inputSchema: {
        max: MaxChangesSchema.default(DEFAULT_CHANGES_MAX).describe("Maximum number of changes to show"),
        path: DepotPathSchema.optional().describe("Only changes affecting this path"),
      },
    },
    (args) =>
      args.finish({
        kind: "changes",
        max: args.optionalInteger("max") ?? DEFAULT_CHANGES_MAX,
        path: args.optionalString("path"),
      })
  );
};
