export type PolicyResult =
  | { compliant: true }
  | { compliant: false; reason: string };

/** A violation kept for the scenario's assertion. */
export interface FailureRecord {
  identifier: string;
  issue: string;
}

export const COMPLIANT: PolicyResult = { compliant: true };

export function violation(reason: string): PolicyResult {
  return { compliant: false, reason };
}

/**
 * Runs a check over every item and keeps the violations, in input order.
 */
export function collectFailures<T>(
  items: readonly T[],
  identify: (item: T) => string,
  check: (item: T) => PolicyResult,
): FailureRecord[] {
  const failures: FailureRecord[] = [];
  for (const item of items) {
    const result = check(item);
    if (!result.compliant) {
      failures.push({ identifier: identify(item), issue: result.reason });
    }
  }
  return failures;
}
