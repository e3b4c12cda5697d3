import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false"])
  .default("false")
  .transform((v: "true" | "false") => v === "true");

// =============================================================================
// Capability Schemas
// =============================================================================

/**
 * Infrastructure schema - logging and runtime mode.
 */
export const infrastructureSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]),
  LOG_FORMAT: z.enum(["json", "text"]).default("text"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal"])
    .default("info"),
  SERVICE_NAME: z.string().default("dbx-governance"),
});

/**
 * Workspace connection schema - required by anything that talks to Databricks.
 * Either a personal access token or an OAuth M2M client must be configured.
 */
export const workspaceSchema = z.object({
  DATABRICKS_HOST: z.string().url(),
  DATABRICKS_TOKEN: z.string().min(1).optional(),
  DATABRICKS_CLIENT_ID: z.string().min(1).optional(),
  DATABRICKS_CLIENT_SECRET: z.string().min(1).optional(),
  DATABRICKS_WAREHOUSE_ID: z.string().min(1, "DATABRICKS_WAREHOUSE_ID is required"),
  STATEMENT_POLL_INTERVAL_MS: z.coerce.number().int().min(0).default(1000),
  STATEMENT_MAX_WAIT_MS: z.coerce.number().int().positive().default(300_000),
});

/**
 * Policy thresholds consumed by the governance predicates.
 */
export const policySchema = z.object({
  GOVERNANCE_CATALOG_SCHEMA: z.string().min(1).default("workspace.test_clustering"),
  COLUMN_DOC_THRESHOLD: z.coerce.number().min(0).max(100).default(80),
  VACUUM_DAYS_THRESHOLD: z.coerce.number().int().min(0).default(30),
  ORPHAN_DAYS_THRESHOLD: z.coerce.number().int().min(0).default(90),
  MIN_TIMEOUT_SECONDS: z.coerce.number().int().min(0).default(300),
  MAX_TIMEOUT_SECONDS: z.coerce.number().int().min(0).default(86_400),
  TABLE_CHECK_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(4),
  TABLE_CHECK_ERROR_MODE: z.enum(["collect", "abort"]).default("collect"),
});

/**
 * Test environment toggles - schema creation before a run, dropping after.
 */
export const testEnvironmentSchema = z.object({
  SKIP_TEST_SETUP: booleanFlag,
  SKIP_TEST_TEARDOWN: booleanFlag,
});

// =============================================================================
// Application Schemas
// =============================================================================

/**
 * Governance application environment schema.
 * Composes: infrastructure + workspace + policy + testEnvironment
 */
export const governanceEnvSchema = infrastructureSchema
  .merge(workspaceSchema)
  .merge(policySchema)
  .merge(testEnvironmentSchema)
  .superRefine((data, ctx) => {
    const hasToken = data.DATABRICKS_TOKEN !== undefined;
    const hasClient =
      data.DATABRICKS_CLIENT_ID !== undefined &&
      data.DATABRICKS_CLIENT_SECRET !== undefined;

    if (!hasToken && !hasClient) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message:
          "Set DATABRICKS_TOKEN or both DATABRICKS_CLIENT_ID and DATABRICKS_CLIENT_SECRET",
      });
    }

    if (data.MIN_TIMEOUT_SECONDS > data.MAX_TIMEOUT_SECONDS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "MIN_TIMEOUT_SECONDS must not exceed MAX_TIMEOUT_SECONDS",
      });
    }
  });

// =============================================================================
// Type Exports
// =============================================================================

export type GovernanceEnv = z.infer<typeof governanceEnvSchema>;

// =============================================================================
// Validation Functions
// =============================================================================

/**
 * Validation function for use with NestJS ConfigModule, called at bootstrap.
 *
 * @example
 * ```typescript
 * ConfigModule.forRoot({
 *   validate: validateGovernanceEnv,
 * })
 * ```
 */
export function validateGovernanceEnv(env: Record<string, unknown>) {
  return governanceEnvSchema.parse(env);
}
