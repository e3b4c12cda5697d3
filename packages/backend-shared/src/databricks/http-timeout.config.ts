/**
 * Databricks HTTP timeout configuration.
 *
 * Axios defaults to 0 (no timeout), which lets a request hang indefinitely
 * on network issues.
 */
export const DATABRICKS_TIMEOUTS = {
  /** Jobs/clusters listing and single-object reads. */
  METADATA: 30_000,

  /** Statement submission: the server holds the call for up to wait_timeout (30s). */
  STATEMENT_SUBMIT: 60_000,

  /** Statement status polling. Quick check. */
  STATUS_POLL: 30_000,

  /** Result chunk download: may return significant row counts. */
  DATA_RETRIEVAL: 120_000,

  /** OAuth token exchange. */
  TOKEN: 15_000,

  /** Default fallback for unspecified operations. */
  DEFAULT: 30_000,
} as const;
