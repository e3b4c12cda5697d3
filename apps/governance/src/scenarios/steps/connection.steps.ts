import { sql, StatementExecutionService } from "@dbx-governance/backend-shared";
import { Injectable, Logger } from "@nestjs/common";

import { parseSelector } from "../../table-checks/table-ref";
import type { StepBindings, StepRegistry } from "../step-registry";

@Injectable()
export class ConnectionSteps implements StepBindings {
  private readonly logger = new Logger(ConnectionSteps.name);

  constructor(private readonly statements: StatementExecutionService) {}

  register(registry: StepRegistry): void {
    registry.define("I connect to the Databricks workspace", async (context) => {
      await this.statements.execute(sql`SELECT 1`);
      context.connected = true;
      this.logger.debug({ message: "Workspace reachable", scenario: context.scenarioName });
    });

    registry.define("I use the catalog schema {string}", (context, args) => {
      const selector = args.text(0);
      parseSelector(selector);
      context.catalogSchema = selector;
    });
  }
}
