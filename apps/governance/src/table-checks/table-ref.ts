import { AppError, ErrorCode } from "@dbx-governance/backend-shared";

export interface TableRef {
  readonly catalog: string;
  readonly schema: string;
  readonly table: string;
}

/** `catalog` or `catalog.schema`. */
export interface CatalogSelector {
  readonly catalog: string;
  readonly schema?: string;
}

export function qualifiedName(ref: TableRef): string {
  return `${ref.catalog}.${ref.schema}.${ref.table}`;
}

function invalid(value: string, violation: string): AppError {
  return new AppError(
    ErrorCode.VALIDATION_ERROR,
    undefined,
    { identifier: value },
    { violations: [violation], field: value },
  );
}

export function parseSelector(selector: string): CatalogSelector {
  const parts = selector.split(".");
  if (parts.length > 2 || parts.some((part) => part.trim().length === 0)) {
    throw invalid(selector, "Selector must be 'catalog' or 'catalog.schema'");
  }
  const [catalog = "", schema] = parts;
  return schema === undefined ? { catalog } : { catalog, schema };
}

/**
 * Splits `catalog.schema.table`. Everything after the second dot belongs to
 * the table name.
 */
export function parseTableName(fullName: string): TableRef {
  const match = /^([^.]+)\.([^.]+)\.(.+)$/.exec(fullName);
  if (!match) {
    throw invalid(fullName, "Table name must be 'catalog.schema.table'");
  }
  const [, catalog = "", schema = "", table = ""] = match;
  return { catalog, schema, table };
}
