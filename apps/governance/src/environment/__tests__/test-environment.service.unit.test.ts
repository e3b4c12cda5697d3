import { ErrorCode, StatementExecutionService } from "@dbx-governance/backend-shared";
import {
  createConfigServiceStub,
  createStatementExecutionStub,
} from "@dbx-governance/test-utils";
import type { StatementExecutionStub } from "@dbx-governance/test-utils";
import { Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { Test } from "@nestjs/testing";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { GovernanceSettings } from "../../config/governance-settings";
import { TestEnvironmentService } from "../test-environment.service";

describe("TestEnvironmentService", () => {
  let statements: StatementExecutionStub;

  async function createService(config: Record<string, unknown> = {}) {
    const module = await Test.createTestingModule({
      providers: [
        TestEnvironmentService,
        GovernanceSettings,
        { provide: StatementExecutionService, useValue: statements },
        {
          provide: ConfigService,
          useValue: createConfigServiceStub({
            GOVERNANCE_CATALOG_SCHEMA: "main.governance_tests",
            ...config,
          }),
        },
      ],
    }).compile();
    return module.get(TestEnvironmentService);
  }

  function executedText(): string[] {
    return statements.execute.mock.calls.map((call): string => call[0].text);
  }

  beforeEach(() => {
    vi.spyOn(Logger.prototype, "log").mockImplementation(() => {});
    statements = createStatementExecutionStub();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("recreates the three clustering tables", async () => {
    const service = await createService();

    await service.setUp();

    expect(executedText()).toEqual([
      "CREATE SCHEMA IF NOT EXISTS `main`.`governance_tests`",
      "DROP TABLE IF EXISTS `main`.`governance_tests`.`clustered_table`",
      "DROP TABLE IF EXISTS `main`.`governance_tests`.`auto_clustered_table`",
      "DROP TABLE IF EXISTS `main`.`governance_tests`.`no_clustering_table`",
      "CREATE TABLE `main`.`governance_tests`.`clustered_table` (id INT, name STRING, value DOUBLE) CLUSTER BY (id, name)",
      "CREATE TABLE `main`.`governance_tests`.`auto_clustered_table` (id INT, name STRING, value DOUBLE) CLUSTER BY AUTO",
      "CREATE TABLE `main`.`governance_tests`.`no_clustering_table` (id INT, name STRING, value DOUBLE) USING DELTA TBLPROPERTIES ('cluster_exclusion' = 'true')",
    ]);
    expect(statements.execute).toHaveBeenNthCalledWith(1, expect.anything(), {
      catalog: "main",
    });
    expect(statements.execute).toHaveBeenLastCalledWith(expect.anything(), {
      catalog: "main",
      schema: "governance_tests",
    });
  });

  it("drops the schema with its tables", async () => {
    const service = await createService();

    await service.tearDown();

    expect(executedText()).toEqual([
      "DROP SCHEMA IF EXISTS `main`.`governance_tests` CASCADE",
    ]);
  });

  it("skips setup and teardown when configured", async () => {
    const service = await createService({ SKIP_TEST_SETUP: true, SKIP_TEST_TEARDOWN: true });

    await service.setUp();
    await service.tearDown();

    expect(statements.execute).not.toHaveBeenCalled();
  });

  it("requires a schema in the catalog selector", async () => {
    const service = await createService({ GOVERNANCE_CATALOG_SCHEMA: "main" });

    await expect(service.setUp()).rejects.toMatchObject({
      code: ErrorCode.CONFIG_ERROR,
      extensions: { field: "GOVERNANCE_CATALOG_SCHEMA" },
    });
    expect(statements.execute).not.toHaveBeenCalled();
  });
});
