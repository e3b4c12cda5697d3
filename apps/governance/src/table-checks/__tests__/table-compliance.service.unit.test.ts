import { ErrorCode } from "@dbx-governance/backend-shared";
import {
  createConfigServiceStub,
  createFakeTable,
  fakeWorkspaceConfig,
  FakeWorkspace,
  resetFactories,
} from "@dbx-governance/test-utils";
import { Logger } from "@nestjs/common";
import { ConfigModule, ConfigService } from "@nestjs/config";
import { Test } from "@nestjs/testing";
import { setupServer } from "msw/node";
import {
  afterAll,
  afterEach,
  beforeAll,
  beforeEach,
  describe,
  expect,
  it,
  vi,
} from "vitest";

import { GovernanceSettingsModule } from "../../config/governance-settings.module";
import { TableChecksModule } from "../table-checks.module";
import { TableComplianceService } from "../table-compliance.service";

const MB = 1024 * 1024;
const SELECTOR = "main.lake";
const server = setupServer();

function seedWorkspace(): FakeWorkspace {
  return new FakeWorkspace()
    .addTable(
      createFakeTable({
        catalog: "main",
        schema: "lake",
        name: "good",
        lastModified: "2024-06-25T00:00:00.000Z",
        history: [
          { version: 3, timestamp: "2024-06-20T12:00:00.000Z", operation: "VACUUM END" },
        ],
      }),
    )
    .addTable(
      createFakeTable({
        catalog: "main",
        schema: "lake",
        name: "raw_dump",
        comment: "data",
        clusteringColumns: [],
        columns: [
          { name: "customer_id", dataType: "STRING", comment: null },
          { name: "payload", dataType: "STRING", comment: "Raw body" },
        ],
        numFiles: 15_000,
        sizeInBytes: 15_000 * 5 * MB,
        partitionColumns: ["customer_id"],
        partitionCount: 20_000,
        managedLocation: false,
        lastModified: "2023-01-01T00:00:00.000Z",
      }),
    )
    .addTable(
      createFakeTable({
        catalog: "main",
        schema: "lake",
        name: "excluded",
        comment: "Country lookup",
        clusteringColumns: [],
        properties: {
          cluster_exclusion: "true",
          no_vacuum_needed: "true",
          archive: "true",
        },
        lastModified: "2023-01-01T00:00:00.000Z",
      }),
    );
}

describe("TableComplianceService", () => {
  let workspace: FakeWorkspace;
  let service: TableComplianceService;

  beforeAll(() => {
    server.listen({ onUnhandledRequest: "error" });
  });

  beforeEach(async () => {
    resetFactories();
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2024-06-30T12:00:00.000Z"));
    vi.spyOn(Logger.prototype, "log").mockImplementation(() => {});
    vi.spyOn(Logger.prototype, "debug").mockImplementation(() => {});
    vi.spyOn(Logger.prototype, "warn").mockImplementation(() => {});

    workspace = seedWorkspace();
    server.use(...workspace.handlers());

    const module = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({ isGlobal: true, ignoreEnvFile: true }),
        GovernanceSettingsModule,
        TableChecksModule,
      ],
    })
      .overrideProvider(ConfigService)
      .useValue(createConfigServiceStub(fakeWorkspaceConfig()))
      .compile();
    service = module.get(TableComplianceService);
  });

  afterEach(() => {
    server.resetHandlers();
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  afterAll(() => {
    server.close();
  });

  it("fails unclustered tables unless exclusions are allowed", async () => {
    await expect(service.checkClustering(SELECTOR)).resolves.toEqual({
      failed: ["main.lake.excluded", "main.lake.raw_dump"],
      errors: [],
    });
    await expect(
      service.checkClustering(SELECTOR, { allowExclusion: true }),
    ).resolves.toEqual({ failed: ["main.lake.raw_dump"], errors: [] });
  });

  it("fails generic table comments", async () => {
    const outcome = await service.checkTableComments(SELECTOR);

    expect(outcome.failed).toEqual(["main.lake.raw_dump"]);
  });

  it("checks column documentation against a threshold", async () => {
    expect((await service.checkColumnDocumentation(SELECTOR, 80)).failed).toEqual([
      "main.lake.raw_dump",
    ]);
    expect((await service.checkColumnDocumentation(SELECTOR, 50)).failed).toEqual([]);
  });

  it("fails undocumented critical columns", async () => {
    const outcome = await service.checkCriticalColumns(SELECTOR, ["id", "email"]);

    expect(outcome.failed).toEqual(["main.lake.raw_dump"]);
    expect(Logger.prototype.debug).toHaveBeenCalledWith({
      message: "Undocumented critical columns",
      table: "main.lake.raw_dump",
      columns: ["customer_id"],
    });
  });

  it("checks vacuum recency, honouring the opt-out tag", async () => {
    expect((await service.checkVacuumRecency(SELECTOR, 30)).failed).toEqual([
      "main.lake.raw_dump",
    ]);
    expect((await service.checkVacuumRecency(SELECTOR, 9)).failed).toEqual([
      "main.lake.good",
      "main.lake.raw_dump",
    ]);
  });

  it("flags stale tables that are not archived", async () => {
    const outcome = await service.checkOrphans(SELECTOR, 90);

    expect(outcome.failed).toEqual(["main.lake.raw_dump"]);
  });

  it("checks file sizing", async () => {
    expect((await service.checkFileSizing(SELECTOR)).failed).toEqual([
      "main.lake.raw_dump",
    ]);
    expect(
      (
        await service.checkFileSizing(SELECTOR, {
          minAverageMb: 1,
          maxAverageMb: 1024,
          smallFileThresholdMb: 10,
          maxSmallFiles: 20_000,
        })
      ).failed,
    ).toEqual([]);
  });

  it("checks partition counts and columns", async () => {
    expect((await service.checkPartitionHealth(SELECTOR)).failed).toEqual([
      "main.lake.raw_dump",
    ]);
  });

  it("checks the average partition size", async () => {
    expect((await service.checkAveragePartitionSize(SELECTOR, 128)).failed).toEqual([
      "main.lake.raw_dump",
    ]);
    expect((await service.checkAveragePartitionSize(SELECTOR, 3)).failed).toEqual([]);
  });

  it("fails external tables", async () => {
    const outcome = await service.checkManagedLocation(SELECTOR);

    expect(outcome.failed).toEqual(["main.lake.raw_dump"]);
  });

  it("records tables whose metadata cannot be read", async () => {
    workspace.failStatement(
      /^DESCRIBE DETAIL .*`good`$/,
      "[INSUFFICIENT_PERMISSIONS] User does not have SELECT on table.",
    );

    const outcome = await service.checkClustering(SELECTOR, { allowExclusion: true });

    expect(outcome).toEqual({
      failed: ["main.lake.raw_dump"],
      errors: [
        {
          identifier: "main.lake.good",
          message:
            "SQL statement execution failed. ([INSUFFICIENT_PERMISSIONS] User does not have SELECT on table.)",
          code: ErrorCode.STATEMENT_FAILED,
        },
      ],
    });
  });
});
