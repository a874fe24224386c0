/**
 * p4_submit tool - Submit opened files.
 */

import { FileListSchema } from "./schemas.js";
import * as z from "zod/v4";
import type { ToolRegistrar } from "./types.js";

export const registerP4Submit: ToolRegistrar = (registry) => {
  registry.registerTool(
    "p4_submit",
    {
      title: "P4 submit",
      description: `Submit changes to the depot with a description.

Without files, every file opened in the default changelist is submitted.`,
      inputSchema: {
        description: z.string().describe("Change description"),
        files: FileListSchema.optional().describe("Specific files to submit (default: all opened files)"),
      },
    },
    (args) =>
      args.finish({
        kind: "submit",
        description: args.requiredString("description"),
        files: args.optionalStringArray("files"),
      })
  );
};
