import { ErrorCode } from "./error-codes";

/**
 * Operator-facing messages for each error code.
 *
 * Kept generic: statement text, table names and upstream messages travel
 * in ErrorContext, which is scrubbed before logging.
 */
export const ErrorMessages: Record<ErrorCode, string> = {
  // Databricks HTTP errors
  [ErrorCode.DATABRICKS_BAD_REQUEST]: "Invalid request to the Databricks workspace.",
  [ErrorCode.DATABRICKS_AUTH_FAILED]:
    "Databricks authentication failed. Check the workspace token or OAuth client.",
  [ErrorCode.DATABRICKS_CREDENTIALS_MISSING]:
    "No Databricks credentials configured.",
  [ErrorCode.DATABRICKS_FORBIDDEN]:
    "Access denied. The principal lacks permission for this operation.",
  [ErrorCode.DATABRICKS_NOT_FOUND]: "The requested workspace object was not found.",
  [ErrorCode.DATABRICKS_RATE_LIMITED]: "Databricks rate limit reached.",
  [ErrorCode.DATABRICKS_SERVER_ERROR]:
    "The Databricks workspace is temporarily unavailable.",

  // SQL statement execution
  [ErrorCode.STATEMENT_FAILED]: "SQL statement execution failed.",
  [ErrorCode.STATEMENT_TIMEOUT]: "SQL statement did not finish in time.",
  [ErrorCode.PAGINATION_EXCEEDED]: "Result set too large to page through.",
  [ErrorCode.METADATA_MALFORMED]: "Workspace metadata could not be parsed.",

  // Scenario bindings
  [ErrorCode.STEP_UNDEFINED]: "No step definition matches this step.",
  [ErrorCode.STEP_AMBIGUOUS]: "More than one step definition matches this step.",
  [ErrorCode.FEATURE_PARSE_FAILED]: "Feature file could not be parsed.",
  [ErrorCode.SCENARIO_STATE_MISSING]:
    "An earlier step did not record the state this step checks.",

  // Generic
  [ErrorCode.VALIDATION_ERROR]: "Invalid input.",
  [ErrorCode.CONFIG_ERROR]: "Configuration error.",
  [ErrorCode.UNKNOWN]: "An unexpected error occurred.",
};
