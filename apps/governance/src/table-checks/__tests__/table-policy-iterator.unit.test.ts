import { AppError, ErrorCode } from "@dbx-governance/backend-shared";
import { createConfigServiceStub } from "@dbx-governance/test-utils";
import { Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { Test } from "@nestjs/testing";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { GovernanceSettings } from "../../config/governance-settings";
import type { TableDetail } from "../table-detail";
import { parseTableDetail } from "../table-detail";
import { TableEnumerator } from "../table-enumerator";
import { TableMetadataService } from "../table-metadata.service";
import { TablePolicyIterator } from "../table-policy-iterator";
import type { TableRef } from "../table-ref";

function ref(table: string): TableRef {
  return { catalog: "main", schema: "sales", table };
}

function detail(comment: string | null): TableDetail {
  return { ...parseTableDetail({}), comment };
}

describe("TablePolicyIterator", () => {
  let iterator: TablePolicyIterator;
  let enumerate: ReturnType<typeof vi.fn>;
  let getTableDetail: ReturnType<typeof vi.fn>;

  async function build(config: Record<string, unknown> = {}): Promise<void> {
    const module = await Test.createTestingModule({
      providers: [
        TablePolicyIterator,
        GovernanceSettings,
        { provide: ConfigService, useValue: createConfigServiceStub(config) },
        { provide: TableEnumerator, useValue: { enumerate } },
        { provide: TableMetadataService, useValue: { getTableDetail } },
      ],
    }).compile();
    iterator = module.get(TablePolicyIterator);
  }

  beforeEach(async () => {
    vi.spyOn(Logger.prototype, "log").mockImplementation(() => {});
    vi.spyOn(Logger.prototype, "warn").mockImplementation(() => {});

    enumerate = vi
      .fn()
      .mockResolvedValue([ref("zeta"), ref("alpha"), ref("mid")]);
    getTableDetail = vi.fn(async (table: TableRef) =>
      detail(table.table === "mid" ? "Mid table" : null),
    );
    await build();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns failing tables sorted by name", async () => {
    const outcome = await iterator.forEachTable(
      "main.sales",
      (tableDetail) => tableDetail.comment !== null,
    );

    expect(enumerate).toHaveBeenCalledWith("main.sales");
    expect(outcome).toEqual({
      failed: ["main.sales.alpha", "main.sales.zeta"],
      errors: [],
    });
  });

  it("passes the table reference to async predicates", async () => {
    const seen: string[] = [];

    const outcome = await iterator.forEachTable("main.sales", async (_, table) => {
      seen.push(table.table);
      return true;
    });

    expect(seen.sort()).toEqual(["alpha", "mid", "zeta"]);
    expect(outcome.failed).toEqual([]);
  });

  it("collects per-table errors and keeps checking", async () => {
    getTableDetail.mockImplementation(async (table: TableRef) => {
      if (table.table === "zeta") {
        throw new AppError(ErrorCode.STATEMENT_FAILED, undefined, {
          statusMessage: "TABLE_OR_VIEW_NOT_FOUND",
        });
      }
      if (table.table === "alpha") {
        throw new Error("socket hang up");
      }
      return detail(null);
    });

    const outcome = await iterator.forEachTable("main.sales", () => false);

    expect(outcome).toEqual({
      failed: ["main.sales.mid"],
      errors: [
        {
          identifier: "main.sales.alpha",
          message: "An unexpected error occurred. (socket hang up)",
          code: ErrorCode.UNKNOWN,
        },
        {
          identifier: "main.sales.zeta",
          message: "SQL statement execution failed. (TABLE_OR_VIEW_NOT_FOUND)",
          code: ErrorCode.STATEMENT_FAILED,
        },
      ],
    });
  });

  it("logs per-table errors with credentials scrubbed", async () => {
    getTableDetail.mockImplementation(async (table: TableRef) => {
      if (table.table === "mid") {
        throw new AppError(ErrorCode.STATEMENT_FAILED, undefined, {
          statusMessage: "Bearer test-token rejected",
        });
      }
      return detail(null);
    });

    await iterator.forEachTable("main.sales", () => true);

    expect(Logger.prototype.warn).toHaveBeenCalledWith({
      message: "Table check errored",
      table: "main.sales.mid",
      error: "SQL statement execution failed. (Bearer [REDACTED] rejected)",
      code: ErrorCode.STATEMENT_FAILED,
      context: { statusMessage: "Bearer [REDACTED] rejected" },
    });
  });

  it("records predicate errors against the table", async () => {
    const outcome = await iterator.forEachTable("main.sales", (_, table) => {
      if (table.table === "mid") {
        throw new Error("bad metadata");
      }
      return true;
    });

    expect(outcome.errors).toEqual([
      {
        identifier: "main.sales.mid",
        message: "An unexpected error occurred. (bad metadata)",
        code: ErrorCode.UNKNOWN,
      },
    ]);
  });

  it("aborts on permission errors even in collect mode", async () => {
    const denied = new AppError(ErrorCode.DATABRICKS_FORBIDDEN);
    getTableDetail.mockRejectedValue(denied);

    await expect(iterator.forEachTable("main.sales", () => true)).rejects.toBe(denied);
  });

  it("rethrows the first error in abort mode", async () => {
    await build({ TABLE_CHECK_ERROR_MODE: "abort", TABLE_CHECK_CONCURRENCY: 1 });
    getTableDetail.mockRejectedValue(new Error("socket hang up"));

    await expect(iterator.forEachTable("main.sales", () => true)).rejects.toThrow(
      "socket hang up",
    );
    expect(getTableDetail).toHaveBeenCalledTimes(1);
  });

  it("lets a call override the configured error mode", async () => {
    getTableDetail.mockRejectedValue(new Error("socket hang up"));

    await expect(
      iterator.forEachTable("main.sales", () => true, { errorMode: "abort" }),
    ).rejects.toThrow("socket hang up");
  });

  it("propagates enumeration failures", async () => {
    enumerate.mockRejectedValue(new AppError(ErrorCode.VALIDATION_ERROR));

    await expect(iterator.forEachTable("a.b.c", () => true)).rejects.toMatchObject({
      code: ErrorCode.VALIDATION_ERROR,
    });
  });
});
