import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@pegforge/runtime",
    globals: true,
    environment: "node",
  },
});
