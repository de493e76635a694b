import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@pegforge/analyzer",
    globals: true,
    environment: "node",
  },
});
