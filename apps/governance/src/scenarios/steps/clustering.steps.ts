import { Injectable } from "@nestjs/common";

import { TableComplianceService } from "../../table-checks/table-compliance.service";
import { assertTableOutcome } from "../policy-assertion.error";
import type { StepBindings, StepRegistry } from "../step-registry";

@Injectable()
export class ClusteringSteps implements StepBindings {
  constructor(private readonly compliance: TableComplianceService) {}

  register(registry: StepRegistry): void {
    registry.define(
      "I check all tables in {string} are clustered or auto-clustered",
      async (context, args) => {
        context.catalogSchema = args.text(0);
        context.recordTableCheck(
          "clustering",
          await this.compliance.checkClustering(context.catalogSchema),
        );
      },
    );

    registry.define(
      "I check all tables in {string} are clustered, auto-clustered or excluded",
      async (context, args) => {
        context.catalogSchema = args.text(0);
        context.recordTableCheck(
          "clustering",
          await this.compliance.checkClustering(context.catalogSchema, {
            allowExclusion: true,
          }),
        );
      },
    );

    registry.define("all tables should be clustered or auto-clustered", (context) => {
      assertTableOutcome(
        "Tables neither clustered nor auto-clustered",
        context.requireTableCheck("clustering"),
      );
    });
  }
}
