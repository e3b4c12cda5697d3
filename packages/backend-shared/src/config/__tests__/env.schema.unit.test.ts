import { describe, expect, it } from "vitest";

import { governanceEnvSchema, validateGovernanceEnv } from "../env.schema";

function makeEnv(overrides: Record<string, unknown> = {}) {
  return {
    NODE_ENV: "development",
    DATABRICKS_HOST: "https://test-workspace.cloud.databricks.com",
    DATABRICKS_TOKEN: "test-token",
    DATABRICKS_WAREHOUSE_ID: "wh-1",
    ...overrides,
  };
}

describe("env.schema", () => {
  describe("governanceEnvSchema", () => {
    it("parses a minimal valid env and applies policy defaults", () => {
      const result = governanceEnvSchema.safeParse(makeEnv());

      expect(result.success).toBe(true);
      if (!result.success) {
        throw new Error("Expected parse to succeed");
      }

      expect(result.data.COLUMN_DOC_THRESHOLD).toBe(80);
      expect(result.data.VACUUM_DAYS_THRESHOLD).toBe(30);
      expect(result.data.ORPHAN_DAYS_THRESHOLD).toBe(90);
      expect(result.data.MIN_TIMEOUT_SECONDS).toBe(300);
      expect(result.data.MAX_TIMEOUT_SECONDS).toBe(86_400);
      expect(result.data.GOVERNANCE_CATALOG_SCHEMA).toBe(
        "workspace.test_clustering",
      );
      expect(result.data.TABLE_CHECK_CONCURRENCY).toBe(4);
      expect(result.data.TABLE_CHECK_ERROR_MODE).toBe("collect");
      expect(result.data.SKIP_TEST_SETUP).toBe(false);
      expect(result.data.LOG_FORMAT).toBe("text");
    });

    it("coerces numeric thresholds from strings", () => {
      const result = governanceEnvSchema.safeParse(
        makeEnv({ COLUMN_DOC_THRESHOLD: "65", VACUUM_DAYS_THRESHOLD: "7" }),
      );

      if (!result.success) {
        throw new Error("Expected parse to succeed");
      }
      expect(result.data.COLUMN_DOC_THRESHOLD).toBe(65);
      expect(result.data.VACUUM_DAYS_THRESHOLD).toBe(7);
    });

    it("accepts OAuth client credentials instead of a token", () => {
      const result = governanceEnvSchema.safeParse(
        makeEnv({
          DATABRICKS_TOKEN: undefined,
          DATABRICKS_CLIENT_ID: "client-id",
          DATABRICKS_CLIENT_SECRET: "test-secret",
        }),
      );

      expect(result.success).toBe(true);
    });

    it("rejects an env with no credentials", () => {
      const result = governanceEnvSchema.safeParse(
        makeEnv({ DATABRICKS_TOKEN: undefined }),
      );

      expect(result.success).toBe(false);
      if (result.success) {
        throw new Error("Expected parse to fail");
      }
      const messages = result.error.issues.map((issue) => issue.message);
      expect(messages).toContain(
        "Set DATABRICKS_TOKEN or both DATABRICKS_CLIENT_ID and DATABRICKS_CLIENT_SECRET",
      );
    });

    it("rejects a minimum timeout above the maximum", () => {
      const result = governanceEnvSchema.safeParse(
        makeEnv({ MIN_TIMEOUT_SECONDS: "9000", MAX_TIMEOUT_SECONDS: "600" }),
      );

      if (result.success) {
        throw new Error("Expected parse to fail");
      }
      const messages = result.error.issues.map((issue) => issue.message);
      expect(messages).toContain(
        "MIN_TIMEOUT_SECONDS must not exceed MAX_TIMEOUT_SECONDS",
      );
    });

    it("rejects a column documentation threshold above 100", () => {
      const result = governanceEnvSchema.safeParse(
        makeEnv({ COLUMN_DOC_THRESHOLD: "120" }),
      );

      expect(result.success).toBe(false);
    });

    it("parses skip toggles as booleans", () => {
      const result = governanceEnvSchema.safeParse(
        makeEnv({ SKIP_TEST_SETUP: "true", SKIP_TEST_TEARDOWN: "false" }),
      );

      if (!result.success) {
        throw new Error("Expected parse to succeed");
      }
      expect(result.data.SKIP_TEST_SETUP).toBe(true);
      expect(result.data.SKIP_TEST_TEARDOWN).toBe(false);
    });
  });

  describe("validateGovernanceEnv", () => {
    it("throws when DATABRICKS_HOST is not a URL", () => {
      expect(() =>
        validateGovernanceEnv(makeEnv({ DATABRICKS_HOST: "not a url" })),
      ).toThrow();
    });

    it("returns the parsed env", () => {
      const env = validateGovernanceEnv(makeEnv());
      expect(env.DATABRICKS_WAREHOUSE_ID).toBe("wh-1");
    });
  });
});
