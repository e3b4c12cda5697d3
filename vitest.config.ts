import { defineConfig } from "vitest/config";

/**
 * Root Vitest configuration with workspace projects.
 *
 * Each workspace package has its own vitest.config.ts that extends vitest.shared.ts.
 * This root config aggregates all workspace configs.
 *
 * Run specific project:
 *   npx vitest --project governance
 *   npx vitest --project backend-shared
 *
 * Run all tests:
 *   npm test
 */
export default defineConfig({
  test: {
    coverage: {
      provider: "v8",
      include: ["apps/*/src/**", "packages/*/src/**"],
      exclude: [
        "**/*.test.ts",
        "**/__tests__/**",
        "**/test/**",
        "**/node_modules/**",
        "**/dist/**",
      ],
      reporter: ["text", "json", "html"],
    },
    reporters: ["default"],

    projects: [
      "apps/governance/vitest.config.ts",
      "packages/backend-shared/vitest.config.ts",
    ],
  },
});
