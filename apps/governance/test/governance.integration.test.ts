/**
 * Live workspace run of the table scenarios.
 *
 * Creates the clustering test tables, runs the clustering and existence
 * features against them and drops the schema. The features name
 * `workspace.test_clustering`, so GOVERNANCE_CATALOG_SCHEMA must keep its
 * default.
 * Job, cluster and maintenance features depend on the workspace's own
 * contents and are not asserted here.
 */
import type { INestApplicationContext } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import path from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";

import { AppModule } from "../src/app.module";
import { GovernanceRunService } from "../src/scenarios/governance-run.service";

const FEATURES_DIR = path.resolve(__dirname, "../features");
const hasWorkspace = Boolean(process.env.DATABRICKS_HOST);

describe.skipIf(!hasWorkspace)("governance run against a live workspace", () => {
  let app: INestApplicationContext;

  beforeAll(async () => {
    app = await NestFactory.createApplicationContext(AppModule, { logger: false });
  });

  afterAll(async () => {
    await app.close();
  });

  it("passes the clustering and existence scenarios on freshly created tables", async () => {
    const summary = await app
      .get(GovernanceRunService)
      .run([
        path.join(FEATURES_DIR, "table_clustering.feature"),
        path.join(FEATURES_DIR, "table_existence.feature"),
      ]);

    const failures = summary.features
      .flatMap((feature) => feature.scenarios)
      .filter((scenario) => scenario.status === "failed")
      .map((scenario) => `${scenario.name}: ${scenario.steps.find((step) => step.error)?.error}`);
    expect(failures).toEqual([]);
    expect(summary.passed).toBe(3);
  });
});
