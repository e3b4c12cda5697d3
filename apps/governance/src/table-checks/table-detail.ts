import type { CellValue, ResultRow } from "@dbx-governance/backend-shared";

/**
 * `DESCRIBE DETAIL` snapshot. The statement API returns every value as a
 * string; arrays and maps arrive JSON-encoded.
 */
export interface TableDetail {
  format?: string;
  name?: string;
  comment: string | null;
  location?: string;
  createdAt?: string;
  lastModified: string | null;
  partitionColumns: string[];
  clusteringColumns: string[];
  clusterByAuto: boolean;
  numFiles: number;
  sizeInBytes: number;
  properties: Record<string, string>;
  raw: ResultRow;
}

export interface ColumnMetadata {
  name: string;
  dataType: string;
  comment: string | null;
}

export interface HistoryEntry {
  version: number | undefined;
  timestamp: string | null;
  operation: string | null;
}

function parseJson(value: CellValue | undefined): unknown {
  if (value === undefined || value === null || value.length === 0) {
    return undefined;
  }
  try {
    return JSON.parse(value);
  } catch (error) {
    if (error instanceof SyntaxError) {
      return undefined;
    }
    throw error;
  }
}

/** Unparsable or missing lists read as empty. */
export function parseStringList(value: CellValue | undefined): string[] {
  const parsed = parseJson(value);
  return Array.isArray(parsed)
    ? parsed.filter((item): item is string => typeof item === "string")
    : [];
}

export function parseStringMap(value: CellValue | undefined): Record<string, string> {
  const parsed = parseJson(value);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return {};
  }
  const map: Record<string, string> = {};
  for (const [key, entry] of Object.entries(parsed)) {
    if (entry !== null && entry !== undefined) {
      map[key] = String(entry);
    }
  }
  return map;
}

export function parseCount(value: CellValue | undefined): number {
  const parsed = Number(value ?? 0);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : 0;
}

function optional(value: CellValue | undefined): string | undefined {
  return value ?? undefined;
}

/**
 * Builds a TableDetail from a `DESCRIBE DETAIL` row. A missing row yields an
 * empty detail, which fails every clustering and sizing check.
 */
export function parseTableDetail(row: ResultRow | undefined): TableDetail {
  const raw = row ?? {};
  return {
    format: optional(raw.format),
    name: optional(raw.name),
    comment: raw.description ?? null,
    location: optional(raw.location),
    createdAt: optional(raw.createdAt),
    lastModified: raw.lastModified ?? null,
    partitionColumns: parseStringList(raw.partitionColumns),
    clusteringColumns: parseStringList(raw.clusteringColumns),
    clusterByAuto: (raw.clusterByAuto ?? "").toLowerCase() === "true",
    numFiles: parseCount(raw.numFiles),
    sizeInBytes: parseCount(raw.sizeInBytes),
    properties: parseStringMap(raw.properties),
    raw,
  };
}
