import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts", "apps/backend/src/**/*.test.ts", "apps/backend/tests/**/*.test.ts"],
    environment: "node",
    testTimeout: 10_000,
  },
})
