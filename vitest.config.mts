import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["tests/unit/**/*.test.ts"],
    setupFiles: ["./tests/setup.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json"],
      include: ["src/**/*.ts"],
      exclude: ["src/index.ts", "src/**/index.ts", "src/cli/index.ts"],
      thresholds: {
        "src/core/**/*.ts": {
          branches: 85,
          functions: 95,
          lines: 90,
          statements: 90,
        },
      },
    },
    testTimeout: 10000,
    isolate: true,
    restoreMocks: true,
    clearMocks: true,
  },
});
