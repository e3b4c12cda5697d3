import { DatabricksModule } from "@dbx-governance/backend-shared";
import { Module } from "@nestjs/common";

import { EnvironmentModule } from "../environment/environment.module";
import { TableChecksModule } from "../table-checks/table-checks.module";
import { WorkspaceChecksModule } from "../workspace-checks/workspace-checks.module";
import { GovernanceRunService } from "./governance-run.service";
import { ScenarioRunner } from "./scenario-runner";
import { StepRegistry } from "./step-registry";
import type { StepBindings } from "./step-registry";
import { STEP_BINDINGS } from "./steps";

@Module({
  imports: [
    DatabricksModule,
    TableChecksModule,
    WorkspaceChecksModule,
    EnvironmentModule,
  ],
  providers: [
    ...STEP_BINDINGS,
    {
      provide: StepRegistry,
      useFactory: (...bindings: StepBindings[]) => {
        const registry = new StepRegistry();
        for (const binding of bindings) {
          binding.register(registry);
        }
        return registry;
      },
      inject: [...STEP_BINDINGS],
    },
    ScenarioRunner,
    GovernanceRunService,
  ],
  exports: [StepRegistry, ScenarioRunner, GovernanceRunService],
})
export class ScenariosModule {}
