import { Injectable, Logger } from "@nestjs/common";

import { GovernanceSettings } from "../config/governance-settings";
import {
  checkAveragePartitionSize,
  checkClustering,
  checkFileSizing,
  checkManagedLocation,
  checkOrphan,
  checkPartitionHealth,
  checkVacuumRecency,
  criticalColumnsDocumented,
  DEFAULT_FILE_SIZING,
  DEFAULT_MAX_PARTITIONS,
  hasMeaningfulComment,
  isTagged,
  meetsColumnDocumentationThreshold,
  undocumentedCriticalColumns,
} from "../policies";
import type { FileSizingOptions } from "../policies";
import type { TableCheckOutcome } from "./table-check.types";
import { TableMetadataService } from "./table-metadata.service";
import { TablePolicyIterator } from "./table-policy-iterator";
import { qualifiedName } from "./table-ref";

/**
 * One method per table governance rule. Each walks the selector through
 * {@link TablePolicyIterator} and fetches whatever extra metadata its
 * predicate needs.
 */
@Injectable()
export class TableComplianceService {
  private readonly logger = new Logger(TableComplianceService.name);

  constructor(
    private readonly iterator: TablePolicyIterator,
    private readonly metadata: TableMetadataService,
    private readonly settings: GovernanceSettings,
  ) {}

  checkClustering(
    selector: string,
    options: { allowExclusion?: boolean } = {},
  ): Promise<TableCheckOutcome> {
    return this.iterator.forEachTable(selector, (detail) =>
      checkClustering(detail, options.allowExclusion ?? false),
    );
  }

  checkTableComments(selector: string): Promise<TableCheckOutcome> {
    return this.iterator.forEachTable(selector, (detail) =>
      hasMeaningfulComment(detail.comment),
    );
  }

  checkColumnDocumentation(
    selector: string,
    threshold: number = this.settings.columnDocThreshold,
  ): Promise<TableCheckOutcome> {
    return this.iterator.forEachTable(selector, async (_detail, table) => {
      const columns = await this.metadata.getColumns(table);
      return meetsColumnDocumentationThreshold(columns, threshold);
    });
  }

  checkCriticalColumns(
    selector: string,
    patterns: readonly string[],
  ): Promise<TableCheckOutcome> {
    return this.iterator.forEachTable(selector, async (_detail, table) => {
      const columns = await this.metadata.getColumns(table);
      if (criticalColumnsDocumented(columns, patterns)) {
        return true;
      }
      this.logger.debug({
        message: "Undocumented critical columns",
        table: qualifiedName(table),
        columns: undocumentedCriticalColumns(columns, patterns),
      });
      return false;
    });
  }

  checkVacuumRecency(
    selector: string,
    thresholdDays: number = this.settings.vacuumDaysThreshold,
  ): Promise<TableCheckOutcome> {
    const now = Date.now();
    return this.iterator.forEachTable(selector, async (_detail, table) => {
      const properties = await this.metadata.getTableProperties(table);
      if (isTagged(properties, "no_vacuum_needed")) {
        return true;
      }
      const history = await this.metadata.getHistory(table);
      return checkVacuumRecency(history, properties, { thresholdDays, now });
    });
  }

  checkOrphans(
    selector: string,
    thresholdDays: number = this.settings.orphanDaysThreshold,
  ): Promise<TableCheckOutcome> {
    const now = Date.now();
    return this.iterator.forEachTable(selector, async (detail, table) => {
      const properties = await this.metadata.getTableProperties(table);
      return checkOrphan(detail.lastModified, properties, { thresholdDays, now });
    });
  }

  checkFileSizing(
    selector: string,
    options: FileSizingOptions = DEFAULT_FILE_SIZING,
  ): Promise<TableCheckOutcome> {
    return this.iterator.forEachTable(selector, (detail) =>
      checkFileSizing(detail, options),
    );
  }

  checkPartitionHealth(
    selector: string,
    maxPartitions: number = DEFAULT_MAX_PARTITIONS,
  ): Promise<TableCheckOutcome> {
    return this.iterator.forEachTable(selector, async (detail, table) => {
      if (detail.partitionColumns.length === 0) {
        return true;
      }
      const count = await this.metadata.getPartitionCount(table);
      return checkPartitionHealth(detail.partitionColumns, count, maxPartitions);
    });
  }

  checkAveragePartitionSize(
    selector: string,
    minSizeMb: number,
  ): Promise<TableCheckOutcome> {
    return this.iterator.forEachTable(selector, async (detail, table) => {
      if (detail.partitionColumns.length === 0) {
        return true;
      }
      const count = await this.metadata.getPartitionCount(table);
      return checkAveragePartitionSize(
        detail.partitionColumns,
        detail.sizeInBytes,
        count,
        minSizeMb,
      );
    });
  }

  checkManagedLocation(selector: string): Promise<TableCheckOutcome> {
    return this.iterator.forEachTable(selector, async (_detail, table) =>
      checkManagedLocation(await this.metadata.getExtendedMetadata(table)),
    );
  }
}
