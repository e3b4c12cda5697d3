import type { TableDetail } from "../table-checks/table-detail";

export const CLUSTER_EXCLUSION_PROPERTY = "cluster_exclusion";

export function isClustered(
  detail: Pick<TableDetail, "clusteringColumns" | "clusterByAuto">,
): boolean {
  return detail.clusteringColumns.length > 0 || detail.clusterByAuto;
}

/** `cluster_exclusion` set to `true` or `1`, any case. */
export function isClusteringExcluded(properties: Record<string, string>): boolean {
  const value = properties[CLUSTER_EXCLUSION_PROPERTY]?.trim().toLowerCase();
  return value === "true" || value === "1";
}

/**
 * Explicit or automatic clustering passes. With `allowExclusion`, so does a
 * table tagged `cluster_exclusion`. A detail without clustering info fails.
 */
export function checkClustering(
  detail: Pick<TableDetail, "clusteringColumns" | "clusterByAuto" | "properties">,
  allowExclusion = false,
): boolean {
  if (isClustered(detail)) {
    return true;
  }
  return allowExclusion && isClusteringExcluded(detail.properties);
}
