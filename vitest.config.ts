import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    include: ["src/**/__tests__/**/*.test.ts"],
    testTimeout: 15000,
    coverage: {
      thresholds: {
        lines: 70,
      },
    },
  },
});
