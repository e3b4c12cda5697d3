export enum ErrorCode {
  // Databricks HTTP errors
  DATABRICKS_BAD_REQUEST = "DATABRICKS_BAD_REQUEST",
  DATABRICKS_AUTH_FAILED = "DATABRICKS_AUTH_FAILED",
  DATABRICKS_CREDENTIALS_MISSING = "DATABRICKS_CREDENTIALS_MISSING",
  DATABRICKS_FORBIDDEN = "DATABRICKS_FORBIDDEN",
  DATABRICKS_NOT_FOUND = "DATABRICKS_NOT_FOUND",
  DATABRICKS_RATE_LIMITED = "DATABRICKS_RATE_LIMITED",
  DATABRICKS_SERVER_ERROR = "DATABRICKS_SERVER_ERROR",

  // SQL statement execution
  STATEMENT_FAILED = "STATEMENT_FAILED",
  STATEMENT_TIMEOUT = "STATEMENT_TIMEOUT",
  PAGINATION_EXCEEDED = "PAGINATION_EXCEEDED",
  METADATA_MALFORMED = "METADATA_MALFORMED",

  // Scenario bindings
  STEP_UNDEFINED = "STEP_UNDEFINED",
  STEP_AMBIGUOUS = "STEP_AMBIGUOUS",
  FEATURE_PARSE_FAILED = "FEATURE_PARSE_FAILED",
  SCENARIO_STATE_MISSING = "SCENARIO_STATE_MISSING",

  // Generic
  VALIDATION_ERROR = "VALIDATION_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  UNKNOWN = "UNKNOWN",
}
