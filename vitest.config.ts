import { defineConfig } from "vitest/config";

export default defineConfig({
  // Workspace packages resolve to their TypeScript sources
  resolve: {
    conditions: ["development"],
  },
  test: {
    environment: "node",
    env: {
      NODE_ENV: "test",
    },
    include: [
      "shared/**/*.test.ts",
      "daemon/src/**/*.test.ts",
      "cli/src/**/*.test.ts",
    ],
  },
});
