import { Injectable } from "@nestjs/common";

import { GovernanceSettings } from "../../config/governance-settings";
import { parseCriticalPatterns } from "../../policies";
import { TableComplianceService } from "../../table-checks/table-compliance.service";
import { assertTableOutcome } from "../policy-assertion.error";
import type { StepBindings, StepRegistry } from "../step-registry";

@Injectable()
export class DocumentationSteps implements StepBindings {
  constructor(
    private readonly compliance: TableComplianceService,
    private readonly settings: GovernanceSettings,
  ) {}

  register(registry: StepRegistry): void {
    registry.define('each table should have a non-empty "comment" field', async (context) => {
      const outcome = await context.ensureTableCheck("documentation", undefined, () =>
        this.compliance.checkTableComments(context.catalogSchema),
      );
      assertTableOutcome("Tables with missing or generic comments", outcome);
    });

    registry.define('the comment should not be generic like "table" or "data"', async (context) => {
      const outcome = await context.ensureTableCheck("documentation", undefined, () =>
        this.compliance.checkTableComments(context.catalogSchema),
      );
      assertTableOutcome("Tables with missing or generic comments", outcome);
    });

    registry.define(
      "at least {int}% of columns per table should have descriptions",
      async (context, args) => {
        const threshold = args.int(0);
        const outcome = await this.compliance.checkColumnDocumentation(
          context.catalogSchema,
          threshold,
        );
        context.recordTableCheck("columnDocumentation", outcome, String(threshold));
        assertTableOutcome(
          `Tables with less than ${threshold}% of columns documented`,
          outcome,
        );
      },
    );

    registry.define("columns per table should meet the documentation threshold", async (context) => {
      const threshold = this.settings.columnDocThreshold;
      const outcome = await this.compliance.checkColumnDocumentation(
        context.catalogSchema,
        threshold,
      );
      context.recordTableCheck("columnDocumentation", outcome, String(threshold));
      assertTableOutcome(
        `Tables with less than ${threshold}% of columns documented`,
        outcome,
      );
    });

    registry.define(
      "critical columns \\(containing {string}\\) must have descriptions",
      async (context, args) => {
        const patterns = parseCriticalPatterns(args.text(0));
        const outcome = await this.compliance.checkCriticalColumns(
          context.catalogSchema,
          patterns,
        );
        context.recordTableCheck("criticalColumns", outcome, patterns.join(","));
        assertTableOutcome("Tables with undocumented critical columns", outcome);
      },
    );
  }
}
