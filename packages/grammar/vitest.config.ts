import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@pegforge/grammar",
    globals: true,
    environment: "node",
  },
});
