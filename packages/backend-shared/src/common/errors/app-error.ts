import { ErrorCode } from "./error-codes";
import { ErrorMessages } from "./error-messages";

/**
 * Debugging context for error tracing. Scrubbed by errorLogFields before it
 * is logged.
 *
 * Operational details (statement text, upstream status messages) may carry
 * object names from the workspace.
 */
export interface ErrorContext {
  // Correlation IDs
  statementId?: string;
  requestId?: string;

  // Operational details
  operation?: string;
  status?: string;
  statusMessage?: string;
  statement?: string;
  identifier?: string;
  maxPages?: number;
}

/**
 * Structured extension data, safe to print in reports.
 */
export interface AppErrorExtensions {
  /** Validation violations (for VALIDATION_ERROR and CONFIG_ERROR) */
  violations?: string[];
  /** Field or step text that caused the error */
  field?: string;
  /** Retry-after in seconds (for DATABRICKS_RATE_LIMITED) */
  retryAfter?: number;
}

/**
 * Centralized error class for domain errors.
 *
 * Message is derived from the error code so every message is auditable in
 * error-messages.ts.
 *
 * @param code - Error code from ErrorCode enum
 * @param cause - Original error for error chaining
 * @param context - Debugging context (scrubbed before logging)
 * @param extensions - Structured fields safe to show in reports
 */
export class AppError extends Error {
  constructor(
    readonly code: ErrorCode,
    override readonly cause?: unknown,
    readonly context?: ErrorContext,
    readonly extensions?: AppErrorExtensions,
  ) {
    super(ErrorMessages[code]);
    this.name = "AppError";
  }

  /** Message plus the upstream status message, for reports. */
  describe(): string {
    const detail = this.context?.statusMessage;
    return detail ? `${this.message} (${detail})` : this.message;
  }
}
