import { Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";

import { DatabricksApiService } from "./databricks-api.service";
import {
  DATABRICKS_AUTH_PROVIDER,
  createDatabricksAuthProvider,
} from "./databricks-auth.provider";
import { DatabricksHttpClient } from "./databricks-http-client";
import { ClustersService } from "./services/clusters.service";
import { JobsService } from "./services/jobs.service";
import { StatementExecutionService } from "./statement-execution.service";

/**
 * Workspace client. Expects a global ConfigModule validated by
 * `validateGovernanceEnv`.
 */
@Module({
  providers: [
    DatabricksHttpClient,
    DatabricksApiService,
    StatementExecutionService,
    JobsService,
    ClustersService,
    {
      provide: DATABRICKS_AUTH_PROVIDER,
      inject: [ConfigService, DatabricksHttpClient],
      useFactory: createDatabricksAuthProvider,
    },
  ],
  exports: [
    DatabricksApiService,
    StatementExecutionService,
    JobsService,
    ClustersService,
  ],
})
export class DatabricksModule {}
