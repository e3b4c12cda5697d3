import path from "path";
import { defineConfig } from "vitest/config";

/**
 * Workspace packages resolve to their TypeScript sources, so tests never
 * need a build first.
 */
export const workspaceAliases = {
  "@dbx-governance/backend-shared": path.resolve(
    __dirname,
    "packages/backend-shared/src/index.ts",
  ),
  "@dbx-governance/test-utils": path.resolve(
    __dirname,
    "packages/test-utils/src/index.ts",
  ),
};

/**
 * Shared Vitest configuration for the monorepo.
 * Per-package configs extend this with mergeConfig and set their own `root`
 * (the package directory) and `include`; mergeConfig concatenates arrays, so
 * nothing here lists test files.
 *
 * @example
 * import { mergeConfig } from 'vitest/config';
 * import sharedConfig from '../../vitest.shared';
 * export default mergeConfig(sharedConfig, defineConfig({ ... }));
 */
export default defineConfig({
  resolve: {
    alias: workspaceAliases,
  },
  test: {
    globals: true,
    environment: "node",
    exclude: [
      "**/node_modules/**",
      "**/dist/**",
      "**/*.e2e.test.ts",
      "**/*.integration.test.ts",
    ],
    setupFiles: [path.resolve(__dirname, "vitest.setup.ts")],
    env: {
      NODE_ENV: "test",
      LOG_FORMAT: "text",
    },
  },
});
