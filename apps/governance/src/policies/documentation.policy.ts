import type { ColumnMetadata } from "../table-checks/table-detail";

/** Comments that say nothing about the table. Matched case-insensitively. */
export const GENERIC_COMMENTS: ReadonlySet<string> = new Set([
  "table",
  "data",
  "temp",
  "test",
  "tbd",
  "todo",
]);

export function hasMeaningfulComment(comment: string | null | undefined): boolean {
  const trimmed = (comment ?? "").trim();
  if (trimmed.length === 0) {
    return false;
  }
  return !GENERIC_COMMENTS.has(trimmed.toLowerCase());
}

export function isColumnDocumented(column: Pick<ColumnMetadata, "comment">): boolean {
  return (column.comment ?? "").trim().length > 0;
}

/** 100 for a table without columns. */
export function columnDocumentationPercentage(
  columns: readonly Pick<ColumnMetadata, "comment">[],
): number {
  if (columns.length === 0) {
    return 100;
  }
  const documented = columns.filter(isColumnDocumented).length;
  return (documented / columns.length) * 100;
}

export function meetsColumnDocumentationThreshold(
  columns: readonly Pick<ColumnMetadata, "comment">[],
  threshold: number,
): boolean {
  if (columns.length === 0) {
    return true;
  }
  return columnDocumentationPercentage(columns) >= threshold;
}

/** `"email, ssn"` → `["email", "ssn"]`. */
export function parseCriticalPatterns(patterns: string): string[] {
  return patterns
    .split(",")
    .map((pattern) => pattern.trim().toLowerCase())
    .filter((pattern) => pattern.length > 0);
}

export function undocumentedCriticalColumns(
  columns: readonly ColumnMetadata[],
  patterns: readonly string[],
): string[] {
  return columns
    .filter((column) => {
      const name = column.name.toLowerCase();
      return patterns.some((pattern) => name.includes(pattern));
    })
    .filter((column) => !isColumnDocumented(column))
    .map((column) => column.name);
}

export function criticalColumnsDocumented(
  columns: readonly ColumnMetadata[],
  patterns: readonly string[],
): boolean {
  return undocumentedCriticalColumns(columns, patterns).length === 0;
}
