/**
 * p4_add tool - Open new files for add.
 */

import { FileListSchema } from "./schemas.js";
import type { ToolRegistrar } from "./types.js";

export const registerP4Add: ToolRegistrar = (registry) => {
  registry.registerTool(
    "p4_add",
    {
      title: "P4 add",
      description: "Open new files for add to the depot.",
      inputSchema: {
        files: FileListSchema.describe("Files to add"),
      },
    },
    (args) => args.finish({ kind: "add", files: args.requiredStringArray("files") })
  );
};
