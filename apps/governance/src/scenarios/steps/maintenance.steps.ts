import { Injectable, Logger } from "@nestjs/common";

import { GovernanceSettings } from "../../config/governance-settings";
import type { TableCheckOutcome } from "../../table-checks/table-check.types";
import { TableComplianceService } from "../../table-checks/table-compliance.service";
import { TableEnumerator } from "../../table-checks/table-enumerator";
import { TableMetadataService } from "../../table-checks/table-metadata.service";
import { assertTableOutcome } from "../policy-assertion.error";
import type { ScenarioContext } from "../scenario-context";
import type { StepBindings, StepRegistry } from "../step-registry";

@Injectable()
export class MaintenanceSteps implements StepBindings {
  private readonly logger = new Logger(MaintenanceSteps.name);

  constructor(
    private readonly compliance: TableComplianceService,
    private readonly enumerator: TableEnumerator,
    private readonly metadata: TableMetadataService,
    private readonly settings: GovernanceSettings,
  ) {}

  register(registry: StepRegistry): void {
    registry.define(
      "I have permissions to read table metadata and history",
      async (context) => {
        const [first] = await this.enumerator.enumerate(context.catalogSchema);
        if (first) {
          await this.metadata.getHistory(first);
        }
        context.permissions.add("table-history");
      },
    );

    registry.define("I check the table history for VACUUM operations", async (context) => {
      await this.vacuum(context, this.settings.vacuumDaysThreshold);
    });

    registry.define(
      "each table should have a VACUUM operation within the last {int} days",
      async (context, args) => {
        const days = args.int(0);
        const outcome = await this.vacuum(context, days);
        assertTableOutcome(`Tables not vacuumed in the last ${days} days`, outcome);
      },
    );

    registry.define('Or have a "no_vacuum_needed" tag', (context) => {
      assertTableOutcome(
        "Tables without a recent VACUUM or a no_vacuum_needed tag",
        context.requireTableCheck("vacuum"),
      );
    });

    registry.define("I check table access patterns", async (context) => {
      await this.orphans(context, this.settings.orphanDaysThreshold);
    });

    registry.define("I should flag tables with:", (context) => {
      this.flag(context.requireTableCheck("orphans"));
    });

    // Reads are not tracked; both windows use the last modification time.
    for (const expression of [
      "no reads in the last {int} days",
      "no updates in the last {int} days",
    ]) {
      registry.define(expression, async (context, args) => {
        this.flag(await this.orphans(context, args.int(0)));
      });
    }

    registry.define('not tagged with "archive" or "reference"', (context) => {
      this.flag(context.requireTableCheck("orphans"));
    });
  }

  private vacuum(context: ScenarioContext, days: number): Promise<TableCheckOutcome> {
    return context.ensureTableCheck("vacuum", String(days), () =>
      this.compliance.checkVacuumRecency(context.catalogSchema, days),
    );
  }

  private orphans(context: ScenarioContext, days: number): Promise<TableCheckOutcome> {
    return context.ensureTableCheck("orphans", String(days), () =>
      this.compliance.checkOrphans(context.catalogSchema, days),
    );
  }

  /** Orphan detection only reports; it never fails a scenario. */
  private flag(outcome: TableCheckOutcome): void {
    if (outcome.failed.length > 0) {
      this.logger.warn({
        message: "Potentially orphaned tables",
        tables: outcome.failed,
      });
    }
    for (const error of outcome.errors) {
      this.logger.warn({
        message: "Orphan check errored",
        table: error.identifier,
        error: error.message,
      });
    }
  }
}
