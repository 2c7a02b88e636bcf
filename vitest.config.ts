import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    // lowdb's JSONFilePreset swaps in an in-memory adapter when NODE_ENV is
    // "test" (vitest's default); run against the real file adapter instead.
    env: { NODE_ENV: "development" },
  },
});
