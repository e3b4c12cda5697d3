import { AppError } from "./app-error";
import { ErrorCode } from "./error-codes";

/**
 * Converts unknown errors to AppError so reports and logs deal with one shape.
 * The original error is kept as `cause`; its message lands in
 * `context.statusMessage`.
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  const message =
    error instanceof Error
      ? error.message
      : typeof error === "string"
        ? error
        : "Unknown error";
  return new AppError(ErrorCode.UNKNOWN, error, { statusMessage: message });
}

/** Human-readable one-liner for any thrown value. */
export function describeError(error: unknown): string {
  if (error instanceof AppError) {
    return error.describe();
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
