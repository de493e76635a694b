import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@pegforge/compiler",
    globals: true,
    environment: "node",
  },
});
