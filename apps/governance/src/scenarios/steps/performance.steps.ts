import { AppError, ErrorCode } from "@dbx-governance/backend-shared";
import { Injectable } from "@nestjs/common";

import { DEFAULT_MAX_PARTITIONS, parseSizeMb } from "../../policies";
import type { FileSizingOptions } from "../../policies";
import type { TableCheckOutcome } from "../../table-checks/table-check.types";
import { TableComplianceService } from "../../table-checks/table-compliance.service";
import { TableEnumerator } from "../../table-checks/table-enumerator";
import { TableMetadataService } from "../../table-checks/table-metadata.service";
import { ClusterComplianceService } from "../../workspace-checks/cluster-compliance.service";
import { assertTableOutcome } from "../policy-assertion.error";
import type { ScenarioContext } from "../scenario-context";
import type { StepBindings, StepRegistry } from "../step-registry";

function sizingKey(options: FileSizingOptions): string {
  return [
    options.minAverageMb,
    options.maxAverageMb,
    options.smallFileThresholdMb,
    options.maxSmallFiles,
  ].join(":");
}

@Injectable()
export class PerformanceSteps implements StepBindings {
  constructor(
    private readonly compliance: TableComplianceService,
    private readonly enumerator: TableEnumerator,
    private readonly metadata: TableMetadataService,
    private readonly clusters: ClusterComplianceService,
  ) {}

  register(registry: StepRegistry): void {
    registry.define("I have permissions to read table and cluster metadata", async (context) => {
      const [first] = await this.enumerator.enumerate(context.catalogSchema);
      if (first) {
        await this.metadata.getTableDetail(first);
      }
      await this.clusters.loadClusters();
      context.permissions.add("table-metadata");
      context.permissions.add("cluster-metadata");
    });

    registry.define("I analyze the file metrics for each table", async (context) => {
      await this.fileSizing(context, context.fileSizingOptions);
    });

    registry.define(
      "the average file size should be between {int}MB and {word}",
      async (context, args) => {
        const minAverageMb = args.int(0);
        const maxAverageMb = parseSizeMb(args.text(1));
        if (maxAverageMb === undefined) {
          throw new AppError(
            ErrorCode.VALIDATION_ERROR,
            undefined,
            { statusMessage: `Unreadable size: ${args.text(1)}` },
            { field: "max_size" },
          );
        }
        const outcome = await this.fileSizing(context, {
          ...context.fileSizingOptions,
          minAverageMb,
          maxAverageMb,
        });
        assertTableOutcome(
          `Tables with average file size outside ${minAverageMb}MB-${maxAverageMb}MB`,
          outcome,
        );
      },
    );

    registry.define(
      "no table should have more than {int} files under {int}MB",
      async (context, args) => {
        const maxSmallFiles = args.int(0);
        const smallFileThresholdMb = args.int(1);
        const outcome = await this.fileSizing(context, {
          ...context.fileSizingOptions,
          maxSmallFiles,
          smallFileThresholdMb,
        });
        assertTableOutcome("Tables with file sizing issues", outcome);
      },
    );

    registry.define("I count the number of partitions per table", async (context) => {
      await this.partitions(context, DEFAULT_MAX_PARTITIONS);
    });

    registry.define(
      "no table should have more than {int} partitions",
      async (context, args) => {
        const maxPartitions = args.int(0);
        const outcome = await this.partitions(context, maxPartitions);
        assertTableOutcome("Tables with partition issues", outcome);
      },
    );

    registry.define("partition columns should not include high-cardinality fields", (context) => {
      assertTableOutcome(
        "Tables with high-cardinality partition columns",
        context.requireTableCheck("partitions"),
      );
    });

    registry.define(
      "average partition size should be at least {int}MB",
      async (context, args) => {
        const minSizeMb = args.int(0);
        const outcome = await context.ensureTableCheck("partitionSize", String(minSizeMb), () =>
          this.compliance.checkAveragePartitionSize(context.catalogSchema, minSizeMb),
        );
        assertTableOutcome(`Tables with partitions smaller than ${minSizeMb}MB`, outcome);
      },
    );
  }

  private fileSizing(
    context: ScenarioContext,
    options: FileSizingOptions,
  ): Promise<TableCheckOutcome> {
    context.fileSizingOptions = options;
    return context.ensureTableCheck("fileSizing", sizingKey(options), () =>
      this.compliance.checkFileSizing(context.catalogSchema, options),
    );
  }

  private partitions(context: ScenarioContext, maxPartitions: number): Promise<TableCheckOutcome> {
    return context.ensureTableCheck("partitions", String(maxPartitions), () =>
      this.compliance.checkPartitionHealth(context.catalogSchema, maxPartitions),
    );
  }
}
