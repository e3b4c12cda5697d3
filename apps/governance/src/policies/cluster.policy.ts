import type { ClusterSummary } from "@dbx-governance/backend-shared";

import { COMPLIANT, violation } from "./policy-result";
import type { PolicyResult } from "./policy-result";

/** Sources of all-purpose (interactive) clusters; job clusters report `JOB`. */
export const ALL_PURPOSE_SOURCES: ReadonlySet<string> = new Set(["UI", "API"]);

export function isAllPurposeCluster(cluster: ClusterSummary): boolean {
  return ALL_PURPOSE_SOURCES.has(cluster.cluster_source ?? "");
}

/** Job clusters stop with their run and always pass. */
export function checkAutoTermination(
  cluster: ClusterSummary,
  maxMinutes: number,
): PolicyResult {
  if (!isAllPurposeCluster(cluster)) {
    return COMPLIANT;
  }
  const minutes = cluster.autotermination_minutes;
  if (minutes === undefined) {
    return violation("No auto-termination configured");
  }
  if (minutes > maxMinutes) {
    return violation(`Auto-termination too long: ${minutes} minutes`);
  }
  return COMPLIANT;
}

export function checkAutoTerminationEnabled(cluster: ClusterSummary): PolicyResult {
  if (!isAllPurposeCluster(cluster)) {
    return COMPLIANT;
  }
  const minutes = cluster.autotermination_minutes;
  return minutes === undefined || minutes === 0
    ? violation("Auto-termination disabled")
    : COMPLIANT;
}
