import { DatabricksModule } from "@dbx-governance/backend-shared";
import { Module } from "@nestjs/common";

import { ClusterComplianceService } from "./cluster-compliance.service";
import { JobComplianceService } from "./job-compliance.service";

@Module({
  imports: [DatabricksModule],
  providers: [JobComplianceService, ClusterComplianceService],
  exports: [JobComplianceService, ClusterComplianceService],
})
export class WorkspaceChecksModule {}
