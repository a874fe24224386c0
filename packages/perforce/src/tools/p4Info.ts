/**
 * p4_info tool - Show client and server information.
 */

import type { ToolRegistrar } from "./types.js";

export const registerP4Info: ToolRegistrar = (registry) => {
  registry.registerTool(
    "p4_info",
    {
      title: "P4 info",
      description: "Show user, client workspace and server details (runs `p4 info`).",
      inputSchema: {},
    },
    (args) => args.finish({ kind: "info" })
  );
};
