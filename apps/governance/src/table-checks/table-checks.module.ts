import { DatabricksModule } from "@dbx-governance/backend-shared";
import { Module } from "@nestjs/common";

import { TableComplianceService } from "./table-compliance.service";
import { TableEnumerator } from "./table-enumerator";
import { TableMetadataService } from "./table-metadata.service";
import { TablePolicyIterator } from "./table-policy-iterator";

@Module({
  imports: [DatabricksModule],
  providers: [
    TableMetadataService,
    TableEnumerator,
    TablePolicyIterator,
    TableComplianceService,
  ],
  exports: [
    TableMetadataService,
    TableEnumerator,
    TablePolicyIterator,
    TableComplianceService,
  ],
})
export class TableChecksModule {}
