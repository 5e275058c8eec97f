import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    testTimeout: 30000,
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: ["src/**/*.test.ts", "src/cli.ts", "src/test-pdf.ts", "src/test-logger.ts"],
      reporter: ["text"],
      reportsDirectory: ".coverage",
      thresholds: {
        lines: 91,
      },
    },
  },
});
