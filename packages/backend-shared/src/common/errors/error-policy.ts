import { AppError } from "./app-error";
import { ErrorCode } from "./error-codes";

/**
 * Unrecoverable errors stop ALL processing immediately: every further call
 * would fail the same way (auth, permissions, configuration).
 *
 * Per-table checks use it to decide between "record this table as errored"
 * and "abort the whole check". Nothing retries, so no other split is kept.
 */
const UNRECOVERABLE_CODES = new Set<ErrorCode>([
  ErrorCode.DATABRICKS_AUTH_FAILED,
  ErrorCode.DATABRICKS_CREDENTIALS_MISSING,
  ErrorCode.DATABRICKS_FORBIDDEN,
  ErrorCode.CONFIG_ERROR,
]);

export function isUnrecoverable(error: unknown): boolean {
  if (!(error instanceof AppError)) {
    return false;
  }
  return UNRECOVERABLE_CODES.has(error.code);
}
