import { DatabricksModule } from "@dbx-governance/backend-shared";
import { Module } from "@nestjs/common";

import { TestEnvironmentService } from "./test-environment.service";

@Module({
  imports: [DatabricksModule],
  providers: [TestEnvironmentService],
  exports: [TestEnvironmentService],
})
export class EnvironmentModule {}
