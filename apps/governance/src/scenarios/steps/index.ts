import { ClusterSteps } from "./cluster.steps";
import { ClusteringSteps } from "./clustering.steps";
import { ConnectionSteps } from "./connection.steps";
import { DocumentationSteps } from "./documentation.steps";
import { JobComplianceSteps } from "./job-compliance.steps";
import { MaintenanceSteps } from "./maintenance.steps";
import { MetadataSteps } from "./metadata.steps";
import { PerformanceSteps } from "./performance.steps";
import { TableExistenceSteps } from "./table-existence.steps";

export {
  ClusterSteps,
  ClusteringSteps,
  ConnectionSteps,
  DocumentationSteps,
  JobComplianceSteps,
  MaintenanceSteps,
  MetadataSteps,
  PerformanceSteps,
  TableExistenceSteps,
};

/** Every step binding, in registration order. */
export const STEP_BINDINGS = [
  ConnectionSteps,
  TableExistenceSteps,
  ClusteringSteps,
  DocumentationSteps,
  MaintenanceSteps,
  PerformanceSteps,
  MetadataSteps,
  JobComplianceSteps,
  ClusterSteps,
] as const;
