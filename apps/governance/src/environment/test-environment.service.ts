import {
  AppError,
  ErrorCode,
  ident,
  sql,
  StatementExecutionService,
} from "@dbx-governance/backend-shared";
import type { SqlStatement } from "@dbx-governance/backend-shared";
import { Injectable, Logger } from "@nestjs/common";

import { GovernanceSettings } from "../config/governance-settings";
import { parseSelector } from "../table-checks/table-ref";

export const CLUSTERED_TABLE = "clustered_table";
export const AUTO_CLUSTERED_TABLE = "auto_clustered_table";
export const NO_CLUSTERING_TABLE = "no_clustering_table";

/**
 * Creates the tables the clustering scenarios run against and drops their
 * schema afterwards. Both steps can be switched off for runs against
 * existing tables.
 */
@Injectable()
export class TestEnvironmentService {
  private readonly logger = new Logger(TestEnvironmentService.name);

  constructor(
    private readonly statements: StatementExecutionService,
    private readonly settings: GovernanceSettings,
  ) {}

  async setUp(): Promise<void> {
    if (this.settings.skipTestSetup) {
      this.logger.log("Skipping test setup");
      return;
    }
    const { catalog, schema } = this.target();
    const table = (name: string) => ident(catalog, schema, name);

    await this.statements.execute(sql`CREATE SCHEMA IF NOT EXISTS ${ident(catalog, schema)}`, {
      catalog,
    });
    for (const name of [CLUSTERED_TABLE, AUTO_CLUSTERED_TABLE, NO_CLUSTERING_TABLE]) {
      await this.run(sql`DROP TABLE IF EXISTS ${table(name)}`);
    }
    await this.run(
      sql`CREATE TABLE ${table(CLUSTERED_TABLE)} (id INT, name STRING, value DOUBLE) CLUSTER BY (id, name)`,
    );
    await this.run(
      sql`CREATE TABLE ${table(AUTO_CLUSTERED_TABLE)} (id INT, name STRING, value DOUBLE) CLUSTER BY AUTO`,
    );
    await this.run(
      sql`CREATE TABLE ${table(NO_CLUSTERING_TABLE)} (id INT, name STRING, value DOUBLE) USING DELTA TBLPROPERTIES ('cluster_exclusion' = 'true')`,
    );
    this.logger.log({ message: "Test tables created", catalog, schema });
  }

  async tearDown(): Promise<void> {
    if (this.settings.skipTestTeardown) {
      this.logger.log("Skipping test teardown");
      return;
    }
    const { catalog, schema } = this.target();
    await this.statements.execute(sql`DROP SCHEMA IF EXISTS ${ident(catalog, schema)} CASCADE`, {
      catalog,
    });
    this.logger.log({ message: "Test schema dropped", catalog, schema });
  }

  private target(): { catalog: string; schema: string } {
    const selector = parseSelector(this.settings.catalogSchema);
    if (selector.schema === undefined) {
      throw new AppError(
        ErrorCode.CONFIG_ERROR,
        undefined,
        { identifier: this.settings.catalogSchema },
        {
          violations: ["GOVERNANCE_CATALOG_SCHEMA must name a schema"],
          field: "GOVERNANCE_CATALOG_SCHEMA",
        },
      );
    }
    return { catalog: selector.catalog, schema: selector.schema };
  }

  private async run(statement: SqlStatement): Promise<void> {
    await this.statements.execute(statement, this.target());
  }
}
