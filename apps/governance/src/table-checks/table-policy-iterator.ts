import {
  errorLogFields,
  isUnrecoverable,
  toAppError,
} from "@dbx-governance/backend-shared";
import { Injectable, Logger } from "@nestjs/common";

import { GovernanceSettings } from "../config/governance-settings";
import { runBounded } from "./run-bounded";
import type {
  ForEachTableOptions,
  TableCheckError,
  TableCheckOutcome,
  TablePredicate,
} from "./table-check.types";
import { TableEnumerator } from "./table-enumerator";
import { TableMetadataService } from "./table-metadata.service";
import { qualifiedName } from "./table-ref";

/**
 * Applies a predicate to every table under a selector.
 *
 * Each table gets a fresh `DESCRIBE DETAIL` before its predicate runs. In
 * `collect` mode a table that throws lands in `errors` and the remaining
 * tables are still checked; auth, permission and configuration errors abort
 * the whole check in either mode.
 */
@Injectable()
export class TablePolicyIterator {
  private readonly logger = new Logger(TablePolicyIterator.name);

  constructor(
    private readonly enumerator: TableEnumerator,
    private readonly metadata: TableMetadataService,
    private readonly settings: GovernanceSettings,
  ) {}

  async forEachTable(
    selector: string,
    predicate: TablePredicate,
    options: ForEachTableOptions = {},
  ): Promise<TableCheckOutcome> {
    const concurrency = options.concurrency ?? this.settings.tableCheckConcurrency;
    const errorMode = options.errorMode ?? this.settings.tableCheckErrorMode;
    const tables = await this.enumerator.enumerate(selector);

    const failed: string[] = [];
    const errors: TableCheckError[] = [];

    await runBounded(tables, concurrency, async (table) => {
      const identifier = qualifiedName(table);
      try {
        const detail = await this.metadata.getTableDetail(table);
        if (!(await predicate(detail, table))) {
          failed.push(identifier);
        }
      } catch (error) {
        if (errorMode === "abort" || isUnrecoverable(error)) {
          throw error;
        }
        const appError = toAppError(error);
        this.logger.warn({
          message: "Table check errored",
          table: identifier,
          ...errorLogFields(appError),
        });
        errors.push({
          identifier,
          message: appError.describe(),
          code: appError.code,
        });
      }
    });

    failed.sort();
    errors.sort((a, b) => a.identifier.localeCompare(b.identifier));

    this.logger.log({
      message: "Table check finished",
      selector,
      tables: tables.length,
      failed: failed.length,
      errors: errors.length,
    });

    return { failed, errors };
  }
}
