import { Injectable } from "@nestjs/common";

import { TableComplianceService } from "../../table-checks/table-compliance.service";
import { assertTableOutcome } from "../policy-assertion.error";
import type { StepBindings, StepRegistry } from "../step-registry";

@Injectable()
export class MetadataSteps implements StepBindings {
  constructor(private readonly compliance: TableComplianceService) {}

  register(registry: StepRegistry): void {
    registry.define(
      "I check all tables in {string} have a managed location",
      async (context, args) => {
        context.catalogSchema = args.text(0);
        context.recordTableCheck(
          "managedLocation",
          await this.compliance.checkManagedLocation(context.catalogSchema),
        );
      },
    );

    registry.define("all tables should have a managed location", (context) => {
      assertTableOutcome(
        "Tables whose location is not managed",
        context.requireTableCheck("managedLocation"),
      );
    });
  }
}
