import { LoggerModule, validateGovernanceEnv } from "@dbx-governance/backend-shared";
import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";

import { GovernanceSettingsModule } from "./config/governance-settings.module";
import { EnvironmentModule } from "./environment/environment.module";
import { ScenariosModule } from "./scenarios/scenarios.module";
import { TableChecksModule } from "./table-checks/table-checks.module";
import { WorkspaceChecksModule } from "./workspace-checks/workspace-checks.module";

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateGovernanceEnv,
      envFilePath: [".env", "../../.env"],
    }),
    LoggerModule,
    GovernanceSettingsModule,
    TableChecksModule,
    WorkspaceChecksModule,
    EnvironmentModule,
    ScenariosModule,
  ],
})
export class AppModule {}
