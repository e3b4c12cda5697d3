import { Injectable } from "@nestjs/common";

import { ClusterComplianceService } from "../../workspace-checks/cluster-compliance.service";
import { assertNoFailures } from "../policy-assertion.error";
import type { StepBindings, StepRegistry } from "../step-registry";

@Injectable()
export class ClusterSteps implements StepBindings {
  constructor(private readonly compliance: ClusterComplianceService) {}

  register(registry: StepRegistry): void {
    registry.define("I check each cluster's configuration", async (context) => {
      context.clusters = await this.compliance.loadClusters();
    });

    registry.define(
      "all-purpose clusters should have auto_termination_minutes <= {int}",
      (context, args) => {
        const failures = this.compliance.autoTerminationFailures(
          context.requireClusters(),
          args.int(0),
        );
        assertNoFailures("Clusters with termination issues", failures);
      },
    );

    registry.define("no cluster should have auto_termination disabled", (context) => {
      const failures = this.compliance.disabledAutoTerminationFailures(
        context.requireClusters(),
      );
      assertNoFailures("Clusters with auto-termination disabled", failures);
    });
  }
}
