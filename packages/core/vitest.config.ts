import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@pegforge/core",
    globals: true,
    environment: "node",
  },
});
