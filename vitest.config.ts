import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    projects: [
      // Root-level tests: the CLI and the umbrella package
      {
        test: {
          name: "pegforge",
          include: ["tests/**/*.test.ts"],
          globals: true,
          environment: "node",
        },
      },
      // Package tests
      "packages/*/vitest.config.ts",
    ],

    exclude: ["**/node_modules/**", "**/dist/**"],

    typecheck: {
      enabled: false,
    },

    testTimeout: 30000,
  },
});
