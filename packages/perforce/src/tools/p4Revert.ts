/**
 * p4_revert tool - Discard changes to opened files.
 */

import { FileListSchema } from "./schemas.js";
import type { ToolRegistrar } from "./types.js";

export const registerP4Revert: ToolRegistrar = (registry) => {
  registry.registerTool(
    "p4_revert",
    {
      title: "P4 revert",
      description: "Revert opened files, discarding local changes.",
      inputSchema: {
        files: FileListSchema.describe("Files to revert"),
      },
    },
    (args) => args.finish({ kind: "revert", files: args.requiredStringArray("files") })
  );
};
