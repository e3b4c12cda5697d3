import swc from "unplugin-swc";
import { defineConfig } from "vitest/config";

import { workspaceAliases } from "../../vitest.shared";

/**
 * Live workspace runs. Requires DATABRICKS_HOST, a token or OAuth client and
 * DATABRICKS_WAREHOUSE_ID (from the environment or .env); skipped otherwise.
 * Excluded from `npm test`.
 * Run with: npm run test:integration -w @dbx-governance/governance
 */
export default defineConfig({
  resolve: {
    alias: workspaceAliases,
  },
  test: {
    name: "governance-integration",
    globals: true,
    environment: "node",
    include: ["test/**/*.integration.test.ts"],
    setupFiles: ["../../vitest.setup.ts", "./test/vitest-integration.setup.ts"],
    hookTimeout: 300_000, // test schema DDL on a cold warehouse
    testTimeout: 600_000,
    root: __dirname,
  },
  plugins: [
    swc.vite({
      jsc: {
        parser: {
          syntax: "typescript",
          decorators: true,
        },
        transform: {
          decoratorMetadata: true,
          legacyDecorator: true,
        },
      },
    }),
  ],
});
