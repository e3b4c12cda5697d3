import type { FailureRecord } from "../policies";
import type { TableCheckError, TableCheckOutcome } from "../table-checks/table-check.types";

/**
 * A failed governance assertion. The message lists every violation and
 * every per-table error, one per line.
 */
export class PolicyAssertionError extends Error {
  constructor(
    readonly summary: string,
    readonly violations: readonly string[],
    readonly errors: readonly TableCheckError[] = [],
  ) {
    super(formatMessage(summary, violations, errors));
    this.name = "PolicyAssertionError";
  }
}

function formatMessage(
  summary: string,
  violations: readonly string[],
  errors: readonly TableCheckError[],
): string {
  if (violations.length === 0 && errors.length === 0) {
    return summary;
  }
  const counts = [`${violations.length} violation(s)`];
  if (errors.length > 0) {
    counts.push(`${errors.length} error(s)`);
  }
  const lines = [`${summary}: ${counts.join(", ")}`];
  for (const item of violations) {
    lines.push(`  - ${item}`);
  }
  for (const error of errors) {
    lines.push(`  ! ${error.identifier}: ${error.message}`);
  }
  return lines.join("\n");
}

/** Passes only when no table failed and none errored. */
export function assertTableOutcome(summary: string, outcome: TableCheckOutcome): void {
  if (outcome.failed.length > 0 || outcome.errors.length > 0) {
    throw new PolicyAssertionError(summary, outcome.failed, outcome.errors);
  }
}

export function assertNoFailures(summary: string, failures: readonly FailureRecord[]): void {
  if (failures.length > 0) {
    throw new PolicyAssertionError(
      summary,
      failures.map((failure) => `${failure.identifier}: ${failure.issue}`),
    );
  }
}

export function assertThat(condition: boolean, message: string): void {
  if (!condition) {
    throw new PolicyAssertionError(message, []);
  }
}
