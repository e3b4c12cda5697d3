import { FAKE_WORKSPACE_HOST } from "../fake-workspace/fake-workspace";

/**
 * Configuration for services wired against the in-process FakeWorkspace:
 * a placeholder token, no poll delay.
 */
export function fakeWorkspaceConfig(
  overrides: Record<string, unknown> = {},
): Record<string, unknown> {
  return {
    DATABRICKS_HOST: FAKE_WORKSPACE_HOST,
    DATABRICKS_TOKEN: "test-token",
    DATABRICKS_WAREHOUSE_ID: "test-warehouse",
    STATEMENT_POLL_INTERVAL_MS: 0,
    STATEMENT_MAX_WAIT_MS: 5_000,
    ...overrides,
  };
}
