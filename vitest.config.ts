import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["mcp/test/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      include: ["mcp/src/**/*.ts"],
      exclude: ["mcp/src/server.ts"],
    },
  },
});
