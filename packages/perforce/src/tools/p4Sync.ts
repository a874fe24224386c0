/**
 * p4_sync tool - Bring workspace files up to date with the depot.
 */

import * as z from "zod/v4";
import { DEFAULT_SYNC_PATH, DepotPathSchema } from "./schemas.js";
import type { ToolRegistrar } from "./types.js";

export const registerP4Sync: ToolRegistrar = (registry) => {
  registry.registerTool(
    "p4_sync",
    {
      title: "P4 sync",
      description: "Sync workspace files from the depot. Use force to re-fetch files that are already up to date.",
      inputSchema: {
        path: DepotPathSchema.default(DEFAULT_SYNC_PATH).describe("Path to sync"),
        force: z.boolean().default(false).describe("Force sync (-f)"),
      },
    },
    (args) =>
      args.finish({
        kind: "sync",
        path: args.optionalString("path") ?? DEFAULT_SYNC_PATH,
        force: args.optionalBoolean("force") ?? false,
      })
  );
};
