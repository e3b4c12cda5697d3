import { ClustersService } from "@dbx-governance/backend-shared";
import type { ClusterSummary } from "@dbx-governance/backend-shared";
import { Injectable } from "@nestjs/common";

import {
  checkAutoTermination,
  checkAutoTerminationEnabled,
  collectFailures,
} from "../policies";
import type { FailureRecord } from "../policies";

@Injectable()
export class ClusterComplianceService {
  constructor(private readonly clusters: ClustersService) {}

  loadClusters(): Promise<ClusterSummary[]> {
    return this.clusters.list();
  }

  autoTerminationFailures(
    clusters: readonly ClusterSummary[],
    maxMinutes: number,
  ): FailureRecord[] {
    return collectFailures(
      clusters,
      (cluster) => cluster.cluster_name,
      (cluster) => checkAutoTermination(cluster, maxMinutes),
    );
  }

  disabledAutoTerminationFailures(clusters: readonly ClusterSummary[]): FailureRecord[] {
    return collectFailures(
      clusters,
      (cluster) => cluster.cluster_name,
      checkAutoTerminationEnabled,
    );
  }
}
