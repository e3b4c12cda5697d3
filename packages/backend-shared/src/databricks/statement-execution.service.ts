import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { setTimeout as sleep } from "node:timers/promises";

import { AppError, ErrorCode, errorLogFields } from "../common/errors";
import { DatabricksApiService } from "./databricks-api.service";
import { DATABRICKS_TIMEOUTS } from "./http-timeout.config";
import type { SqlStatement } from "./sql";
import {
  resultDataSchema,
  statementResponseSchema,
} from "./types/statement";
import type {
  CellValue,
  ExecuteStatementRequest,
  ResultRow,
  StatementResponse,
  StatementResult,
  StatementState,
  StatementTarget,
} from "./types/statement";

const STATEMENTS_PATH = "/api/2.0/sql/statements";

/** Upper bound on result chunks followed for a single statement. */
export const MAX_RESULT_CHUNKS = 100;

const PENDING_STATES: ReadonlySet<StatementState> = new Set([
  "PENDING",
  "RUNNING",
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Runs SQL through the Statement Execution API against the configured
 * warehouse. Every call is submitted once; a statement still running when
 * the wait budget runs out is cancelled and reported as STATEMENT_TIMEOUT.
 */
@Injectable()
export class StatementExecutionService {
  private readonly logger = new Logger(StatementExecutionService.name);

  constructor(
    private readonly api: DatabricksApiService,
    private readonly configService: ConfigService,
  ) {}

  async execute(
    statement: SqlStatement,
    target: StatementTarget = {},
  ): Promise<StatementResult> {
    const submitted = await this.submit(statement, target);
    const finished = await this.waitForCompletion(submitted, statement);
    const columns = this.columnNames(finished);
    const dataArray = await this.collectRows(finished);

    const rows = dataArray.map((values) => {
      const row: ResultRow = {};
      columns.forEach((column, index) => {
        row[column] = values[index] ?? null;
      });
      return row;
    });

    this.logger.debug({
      message: "Statement finished",
      statementId: finished.statement_id,
      rowCount: rows.length,
    });

    return {
      statementId: finished.statement_id,
      columns,
      rows,
      dataArray,
    };
  }

  /**
   * For statements that return a single JSON document in the first cell
   * (`DESCRIBE ... AS JSON`). No rows yields an empty object.
   */
  async executeJson(
    statement: SqlStatement,
    target: StatementTarget = {},
  ): Promise<Record<string, unknown>> {
    const result = await this.execute(statement, target);
    const cell = result.dataArray[0]?.[0];
    if (cell === undefined || cell === null) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(cell);
    } catch (error) {
      throw new AppError(ErrorCode.METADATA_MALFORMED, error, {
        statementId: result.statementId,
        statement: statement.text,
      });
    }

    if (!isRecord(parsed)) {
      throw new AppError(ErrorCode.METADATA_MALFORMED, undefined, {
        statementId: result.statementId,
        statement: statement.text,
        statusMessage: "Expected a JSON object",
      });
    }
    return parsed;
  }

  private async submit(
    statement: SqlStatement,
    target: StatementTarget,
  ): Promise<StatementResponse> {
    const body: ExecuteStatementRequest = {
      statement: statement.text,
      warehouse_id: this.configService.get<string>("DATABRICKS_WAREHOUSE_ID", ""),
      catalog: target.catalog,
      schema: target.schema,
      parameters:
        statement.parameters.length > 0 ? [...statement.parameters] : undefined,
      wait_timeout: "30s",
      on_wait_timeout: "CONTINUE",
      format: "JSON_ARRAY",
      disposition: "INLINE",
    };

    const data = await this.api.request<unknown>(
      { method: "POST", url: STATEMENTS_PATH, data: body },
      DATABRICKS_TIMEOUTS.STATEMENT_SUBMIT,
    );
    return this.parseResponse(data, statement);
  }

  private async waitForCompletion(
    initial: StatementResponse,
    statement: SqlStatement,
  ): Promise<StatementResponse> {
    const pollIntervalMs = this.configService.get<number>(
      "STATEMENT_POLL_INTERVAL_MS",
      1000,
    );
    const maxWaitMs = this.configService.get<number>(
      "STATEMENT_MAX_WAIT_MS",
      300_000,
    );
    const startedAt = Date.now();
    let current = initial;

    while (PENDING_STATES.has(current.status.state)) {
      if (Date.now() - startedAt >= maxWaitMs) {
        await this.cancel(current.statement_id);
        throw new AppError(ErrorCode.STATEMENT_TIMEOUT, undefined, {
          statementId: current.statement_id,
          statement: statement.text,
          status: current.status.state,
        });
      }

      await sleep(pollIntervalMs);
      const data = await this.api.request<unknown>(
        {
          method: "GET",
          url: `${STATEMENTS_PATH}/${encodeURIComponent(current.statement_id)}`,
        },
        DATABRICKS_TIMEOUTS.STATUS_POLL,
      );
      current = this.parseResponse(data, statement);
    }

    if (current.status.state !== "SUCCEEDED") {
      throw new AppError(ErrorCode.STATEMENT_FAILED, undefined, {
        statementId: current.statement_id,
        statement: statement.text,
        status: current.status.state,
        statusMessage: current.status.error?.message,
      });
    }
    return current;
  }

  private columnNames(response: StatementResponse): string[] {
    const columns = response.manifest?.schema?.columns ?? [];
    return [...columns]
      .sort((a, b) => (a.position ?? 0) - (b.position ?? 0))
      .map((column) => column.name);
  }

  private async collectRows(response: StatementResponse): Promise<CellValue[][]> {
    const rows: CellValue[][] = [...(response.result?.data_array ?? [])];
    let nextChunk = response.result?.next_chunk_index;
    let fetched = 0;

    while (nextChunk !== undefined) {
      if (fetched >= MAX_RESULT_CHUNKS) {
        throw new AppError(ErrorCode.PAGINATION_EXCEEDED, undefined, {
          statementId: response.statement_id,
          maxPages: MAX_RESULT_CHUNKS,
        });
      }

      const data = await this.api.request<unknown>(
        {
          method: "GET",
          url: `${STATEMENTS_PATH}/${encodeURIComponent(response.statement_id)}/result/chunks/${nextChunk}`,
        },
        DATABRICKS_TIMEOUTS.DATA_RETRIEVAL,
      );
      const parsed = resultDataSchema.safeParse(data);
      if (!parsed.success) {
        throw new AppError(ErrorCode.METADATA_MALFORMED, parsed.error, {
          statementId: response.statement_id,
          operation: "result chunk",
        });
      }

      rows.push(...(parsed.data.data_array ?? []));
      nextChunk = parsed.data.next_chunk_index;
      fetched++;
    }

    return rows;
  }

  private async cancel(statementId: string): Promise<void> {
    try {
      await this.api.request(
        {
          method: "POST",
          url: `${STATEMENTS_PATH}/${encodeURIComponent(statementId)}/cancel`,
        },
        DATABRICKS_TIMEOUTS.STATUS_POLL,
      );
    } catch (error) {
      this.logger.warn({
        message: "Failed to cancel timed-out statement",
        statementId,
        ...errorLogFields(error),
      });
    }
  }

  private parseResponse(data: unknown, statement: SqlStatement): StatementResponse {
    const parsed = statementResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new AppError(ErrorCode.METADATA_MALFORMED, parsed.error, {
        statement: statement.text,
        operation: "statement response",
      });
    }
    return parsed.data;
  }
}
