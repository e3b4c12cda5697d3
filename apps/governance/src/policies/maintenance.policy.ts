import type { HistoryEntry } from "../table-checks/table-detail";

const MS_PER_DAY = 86_400_000;

export interface RecencyOptions {
  thresholdDays: number;
  /** Epoch milliseconds. */
  now: number;
}

/** Table tags only opt out with the literal value `true`. */
export function isTagged(properties: Record<string, string>, key: string): boolean {
  return properties[key] === "true";
}

/** Epoch milliseconds, or undefined when the value does not parse. */
export function parseTimestamp(value: string | null | undefined): number | undefined {
  if (value === null || value === undefined || value.trim().length === 0) {
    return undefined;
  }
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? undefined : parsed;
}

/** Whole days elapsed, rounded down. */
export function daysBetween(from: number, to: number): number {
  return Math.floor((to - from) / MS_PER_DAY);
}

function isVacuum(operation: string | null): boolean {
  return operation === "VACUUM" || (operation ?? "").startsWith("VACUUM ");
}

/** Latest VACUUM in the history, whatever order the entries come in. */
export function lastVacuumAt(history: readonly HistoryEntry[]): number | undefined {
  let latest: number | undefined;
  for (const entry of history) {
    if (!isVacuum(entry.operation)) {
      continue;
    }
    const at = parseTimestamp(entry.timestamp);
    if (at !== undefined && (latest === undefined || at > latest)) {
      latest = at;
    }
  }
  return latest;
}

export function checkVacuumRecency(
  history: readonly HistoryEntry[],
  properties: Record<string, string>,
  options: RecencyOptions,
): boolean {
  if (isTagged(properties, "no_vacuum_needed")) {
    return true;
  }
  const last = lastVacuumAt(history);
  if (last === undefined) {
    return false;
  }
  return daysBetween(last, options.now) <= options.thresholdDays;
}

/**
 * False when the table looks abandoned. Archive and reference tables are
 * kept on purpose; a missing or unparsable timestamp is not evidence of
 * abandonment and passes.
 */
export function checkOrphan(
  lastModified: string | null | undefined,
  properties: Record<string, string>,
  options: RecencyOptions,
): boolean {
  if (isTagged(properties, "archive") || isTagged(properties, "reference")) {
    return true;
  }
  const modified = parseTimestamp(lastModified);
  if (modified === undefined) {
    return true;
  }
  return daysBetween(modified, options.now) <= options.thresholdDays;
}
