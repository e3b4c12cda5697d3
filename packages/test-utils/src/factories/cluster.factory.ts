import type { ClusterSummary } from "@dbx-governance/backend-shared";

import { getNextClusterId } from "../setup/reset";

/** An all-purpose cluster with a 60 minute auto-termination. */
export function createCluster(
  overrides: Partial<ClusterSummary> = {},
): ClusterSummary {
  const id = getNextClusterId();
  return {
    cluster_id: `0101-000000-c${id}`,
    cluster_name: `cluster-${id}`,
    cluster_source: "UI",
    autotermination_minutes: 60,
    state: "RUNNING",
    ...overrides,
  };
}
