import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "perforce",
    include: ["test/**/*.test.ts"],
    environment: "node",
    testTimeout: 10000,
    globals: true,
  },
});
