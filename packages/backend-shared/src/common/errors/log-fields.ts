import { AppError } from "./app-error";
import type { ErrorCode } from "./error-codes";
import { describeError } from "./wrap-error";

const BEARER = /\bBearer\s+\S+/gi;
const PERSONAL_ACCESS_TOKEN = /\bdapi[0-9a-z-]+/gi;
const MAX_VALUE_LENGTH = 500;

export interface ErrorLogFields {
  error: string;
  code?: ErrorCode;
  context?: Record<string, string | number>;
}

/**
 * Masks credentials an upstream message may echo back and caps the length
 * of statement text.
 */
export function scrubLogValue(value: string): string {
  const masked = value
    .replace(BEARER, "Bearer [REDACTED]")
    .replace(PERSONAL_ACCESS_TOKEN, "[REDACTED]");
  if (masked.length <= MAX_VALUE_LENGTH) {
    return masked;
  }
  return `${masked.slice(0, MAX_VALUE_LENGTH)}... [truncated]`;
}

/** Structured log fields for a thrown value, with its context scrubbed. */
export function errorLogFields(error: unknown): ErrorLogFields {
  const fields: ErrorLogFields = { error: scrubLogValue(describeError(error)) };
  if (!(error instanceof AppError)) {
    return fields;
  }

  fields.code = error.code;
  if (error.context) {
    const context: Record<string, string | number> = {};
    for (const [key, value] of Object.entries(error.context)) {
      if (typeof value === "string") {
        context[key] = scrubLogValue(value);
      } else if (typeof value === "number") {
        context[key] = value;
      }
    }
    fields.context = context;
  }
  return fields;
}
