import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@pegforge/codegen",
    globals: true,
    environment: "node",
  },
});
