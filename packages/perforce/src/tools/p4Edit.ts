/**
 * p4_edit tool - Open files for edit.
 */

import { FileListSchema } from "./schemas.js";
import type { ToolRegistrar } from "./types.js";

export const registerP4Edit: ToolRegistrar = (registry) => {
  registry.registerTool(
    "p4_edit",
    {
      title: "P4 edit",
      description: "Open files for edit in the default changelist.",
      inputSchema: {
        files: FileListSchema.describe("Files to open for edit"),
      },
    },
    (args) => args.finish({ kind: "edit", files: args.requiredStringArray("files") })
  );
};
