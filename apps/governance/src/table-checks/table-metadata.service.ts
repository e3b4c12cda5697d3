import {
  AppError,
  ErrorCode,
  errorLogFields,
  ident,
  isUnrecoverable,
  sql,
  StatementExecutionService,
} from "@dbx-governance/backend-shared";
import { Injectable, Logger } from "@nestjs/common";

import { parseTableDetail } from "./table-detail";
import type { ColumnMetadata, HistoryEntry, TableDetail } from "./table-detail";
import { qualifiedName } from "./table-ref";
import type { TableRef } from "./table-ref";

/**
 * Per-table metadata reads. Every call goes to the warehouse; nothing is
 * cached between checks.
 */
@Injectable()
export class TableMetadataService {
  private readonly logger = new Logger(TableMetadataService.name);

  constructor(private readonly statements: StatementExecutionService) {}

  async listSchemas(catalog: string): Promise<string[]> {
    const result = await this.statements.execute(
      sql`SHOW SCHEMAS IN ${ident(catalog)}`,
      { catalog },
    );
    return result.dataArray
      .map((row) => row[0])
      .filter((name): name is string => typeof name === "string");
  }

  async listTables(catalog: string, schema: string): Promise<string[]> {
    const result = await this.statements.execute(
      sql`SHOW TABLES IN ${ident(catalog, schema)}`,
      { catalog, schema },
    );
    return result.dataArray
      .map((row) => row[1])
      .filter((name): name is string => typeof name === "string");
  }

  async getTableDetail(ref: TableRef): Promise<TableDetail> {
    const result = await this.statements.execute(
      sql`DESCRIBE DETAIL ${this.name(ref)}`,
      this.target(ref),
    );
    return parseTableDetail(result.rows[0]);
  }

  /** User and system table properties (`SHOW TBLPROPERTIES`). */
  async getTableProperties(ref: TableRef): Promise<Record<string, string>> {
    const result = await this.statements.execute(
      sql`SHOW TBLPROPERTIES ${this.name(ref)}`,
      this.target(ref),
    );
    const properties: Record<string, string> = {};
    for (const [key, value] of result.dataArray) {
      if (typeof key === "string" && value !== null && value !== undefined) {
        properties[key] = value;
      }
    }
    return properties;
  }

  async getColumns(ref: TableRef): Promise<ColumnMetadata[]> {
    const result = await this.statements.execute(
      sql`SELECT column_name, data_type, comment FROM ${ident(ref.catalog, "information_schema", "columns")} WHERE table_schema = ${ref.schema} AND table_name = ${ref.table} ORDER BY ordinal_position`,
      { catalog: ref.catalog },
    );
    return result.rows.map((row) => ({
      name: row.column_name ?? "",
      dataType: row.data_type ?? "",
      comment: row.comment ?? null,
    }));
  }

  /** Newest entries first, as the history is returned. */
  async getHistory(ref: TableRef): Promise<HistoryEntry[]> {
    const result = await this.statements.execute(
      sql`DESCRIBE HISTORY ${this.name(ref)}`,
      this.target(ref),
    );
    return result.rows.map((row) => {
      const version = Number(row.version);
      return {
        version: Number.isInteger(version) ? version : undefined,
        timestamp: row.timestamp ?? null,
        operation: row.operation ?? null,
      };
    });
  }

  /** `DESCRIBE TABLE EXTENDED ... AS JSON` document. */
  async getExtendedMetadata(ref: TableRef): Promise<Record<string, unknown>> {
    return this.statements.executeJson(
      sql`DESCRIBE TABLE EXTENDED ${this.name(ref)} AS JSON`,
      this.target(ref),
    );
  }

  /**
   * Rows of `SHOW PARTITIONS`. A failed listing counts as zero partitions
   * unless the failure is an auth or permission error.
   */
  async getPartitionCount(ref: TableRef): Promise<number> {
    try {
      const result = await this.statements.execute(
        sql`SHOW PARTITIONS ${this.name(ref)}`,
        this.target(ref),
      );
      return result.dataArray.length;
    } catch (error) {
      if (isUnrecoverable(error)) {
        throw error;
      }
      this.logger.warn({
        message: "Partition listing failed; counting 0 partitions",
        table: qualifiedName(ref),
        ...errorLogFields(error),
      });
      return 0;
    }
  }

  /** A missing schema means the table does not exist. */
  async tableExists(ref: TableRef): Promise<boolean> {
    try {
      const tables = await this.listTables(ref.catalog, ref.schema);
      return tables.includes(ref.table);
    } catch (error) {
      if (
        error instanceof AppError &&
        error.code === ErrorCode.STATEMENT_FAILED &&
        (error.context?.statusMessage ?? "").includes("SCHEMA_NOT_FOUND")
      ) {
        return false;
      }
      throw error;
    }
  }

  private name(ref: TableRef) {
    return ident(ref.catalog, ref.schema, ref.table);
  }

  private target(ref: TableRef) {
    return { catalog: ref.catalog, schema: ref.schema };
  }
}
