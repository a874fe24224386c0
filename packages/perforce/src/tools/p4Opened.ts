/**
 * p4_opened tool - List opened files, optionally in one changelist.
 */

import { ChangelistSchema } from "./schemas.js";
import type { ToolRegistrar } from "./types.js";

export const registerP4Opened: ToolRegistrar = (registry) => {
  registry.registerTool(
    "p4_opened",
    {
      title: "P4 opened",
      description: "List files opened for edit, add or delete.",
      inputSchema: {
        changelist: ChangelistSchema.optional().describe("Changelist number (default: all changelists)"),
      },
    },
    (args) => args.finish({ kind: "opened", changelist: args.optionalString("changelist") })
  );
};
