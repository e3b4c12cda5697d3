import type { TableDetail } from "../table-checks/table-detail";

const BYTES_PER_MB = 1024 * 1024;

export interface FileSizingOptions {
  minAverageMb: number;
  maxAverageMb: number;
  smallFileThresholdMb: number;
  maxSmallFiles: number;
}

export const DEFAULT_FILE_SIZING: FileSizingOptions = {
  minAverageMb: 64,
  maxAverageMb: 1024,
  smallFileThresholdMb: 10,
  maxSmallFiles: 10_000,
};

export const DEFAULT_MAX_PARTITIONS = 10_000;

/** Substrings that mark a partition column as high-cardinality. */
export const HIGH_CARDINALITY_INDICATORS = ["id", "uuid", "guid", "timestamp"] as const;

export interface FileMetrics {
  numFiles: number;
  sizeInBytes: number;
  averageFileSizeMb: number;
}

export function fileMetrics(
  detail: Pick<TableDetail, "numFiles" | "sizeInBytes">,
): FileMetrics {
  const averageBytes = detail.numFiles > 0 ? detail.sizeInBytes / detail.numFiles : 0;
  return {
    numFiles: detail.numFiles,
    sizeInBytes: detail.sizeInBytes,
    averageFileSizeMb: averageBytes / BYTES_PER_MB,
  };
}

/**
 * Estimate only: file-level sizes are not available, so 80% of the files
 * count as small when the average is under the threshold.
 */
export function estimateSmallFiles(metrics: FileMetrics, thresholdMb: number): number {
  if (metrics.averageFileSizeMb < thresholdMb) {
    return Math.floor(metrics.numFiles * 0.8);
  }
  return 0;
}

export function checkFileSizing(
  detail: Pick<TableDetail, "numFiles" | "sizeInBytes">,
  options: FileSizingOptions = DEFAULT_FILE_SIZING,
): boolean {
  const metrics = fileMetrics(detail);
  if (
    metrics.averageFileSizeMb < options.minAverageMb ||
    metrics.averageFileSizeMb > options.maxAverageMb
  ) {
    return false;
  }
  return estimateSmallFiles(metrics, options.smallFileThresholdMb) <= options.maxSmallFiles;
}

export function highCardinalityColumns(partitionColumns: readonly string[]): string[] {
  return partitionColumns.filter((column) => {
    const name = column.toLowerCase();
    return HIGH_CARDINALITY_INDICATORS.some((indicator) => name.includes(indicator));
  });
}

/** Unpartitioned tables pass whatever count is reported. */
export function checkPartitionHealth(
  partitionColumns: readonly string[],
  partitionCount: number,
  maxPartitions: number = DEFAULT_MAX_PARTITIONS,
): boolean {
  if (partitionColumns.length === 0) {
    return true;
  }
  if (partitionCount > maxPartitions) {
    return false;
  }
  return highCardinalityColumns(partitionColumns).length === 0;
}

export function checkAveragePartitionSize(
  partitionColumns: readonly string[],
  sizeInBytes: number,
  partitionCount: number,
  minSizeMb: number,
): boolean {
  if (partitionColumns.length === 0 || partitionCount <= 0) {
    return true;
  }
  return sizeInBytes / partitionCount / BYTES_PER_MB >= minSizeMb;
}

/** `"1GB"` → 1024, `"512MB"` or `"512"` → 512. Undefined when unreadable. */
export function parseSizeMb(value: string): number | undefined {
  const match = /^\s*(\d+)\s*(GB|MB)?\s*$/i.exec(value);
  if (!match) {
    return undefined;
  }
  const amount = Number(match[1]);
  return (match[2] ?? "MB").toUpperCase() === "GB" ? amount * 1024 : amount;
}
