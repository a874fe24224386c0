import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/server.ts"],
  format: ["esm"],
  platform: "node",
  target: "node20",
  dts: false,
  clean: true,
  sourcemap: true,
  // Workspace packages export TypeScript sources, so they are bundled in
  noExternal: [/^@p4mcp\//],
});
