// vitest.config.ts
// Test runner configuration for every workspace package

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/src/__tests__/**/*.test.ts"],
    testTimeout: 10_000,
  },
});
