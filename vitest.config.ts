import { defineConfig } from "vitest/config";

/**
 * Root Vitest configuration with workspace projects.
 *
 * Each workspace package has its own vitest.config.ts that extends vitest.shared.ts.
 *
 * Run a specific project:
 *   npx vitest run --project ingest
 *
 * Run all tests:
 *   npm test
 */
export default defineConfig({
  test: {
    coverage: {
      provider: "v8",
      include: ["packages/*/src/**"],
      exclude: [
        "**/*.test.ts",
        "**/__tests__/**",
        "**/node_modules/**",
        "**/dist/**",
      ],
      reporter: ["text", "json", "html"],
    },
    reporters: ["default"],

    projects: [
      "packages/shared/vitest.config.ts",
      "packages/ingest/vitest.config.ts",
      "packages/test-utils/vitest.config.ts",
    ],
  },
});
