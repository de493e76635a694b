import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@pegforge/tokenizer",
    globals: true,
    environment: "node",
  },
});
