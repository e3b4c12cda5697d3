import type { ClusterSummary } from "@dbx-governance/backend-shared";
import { AppError, ErrorCode } from "@dbx-governance/backend-shared";

import { DEFAULT_FILE_SIZING } from "../policies";
import type { FailureRecord, FileSizingOptions } from "../policies";
import type { TableCheckOutcome } from "../table-checks/table-check.types";
import type { JobRecord } from "../workspace-checks/job-compliance.service";

export type TableCheckName =
  | "clustering"
  | "documentation"
  | "columnDocumentation"
  | "criticalColumns"
  | "vacuum"
  | "orphans"
  | "fileSizing"
  | "partitions"
  | "partitionSize"
  | "managedLocation";

export type JobCheckName =
  | "userAccounts"
  | "servicePrincipal"
  | "retries"
  | "retryOnTimeout"
  | "timeout"
  | "timeoutRange"
  | "cluster";

/**
 * A table check's outcome. `key` identifies the selector and thresholds it
 * ran with, so a later step with different numbers knows to run it again.
 */
interface RecordedTableCheck {
  outcome: TableCheckOutcome;
  key: string;
}

export interface TableLookup {
  fullName: string;
  found: boolean;
}

/**
 * State shared by the steps of one scenario. A fresh instance is built for
 * every scenario and dropped when it ends.
 */
export class ScenarioContext {
  connected = false;
  catalogSchema: string;
  tableLookup: TableLookup | undefined;
  jobs: JobRecord[] | undefined;
  filteredJobs: JobRecord[] | undefined;
  clusters: ClusterSummary[] | undefined;
  readonly permissions = new Set<string>();
  fileSizingOptions: FileSizingOptions = DEFAULT_FILE_SIZING;

  private readonly tableChecks = new Map<TableCheckName, RecordedTableCheck>();
  private readonly jobFailures = new Map<JobCheckName, FailureRecord[]>();

  constructor(
    readonly scenarioName: string,
    defaultCatalogSchema: string,
  ) {
    this.catalogSchema = defaultCatalogSchema;
  }

  recordTableCheck(
    name: TableCheckName,
    outcome: TableCheckOutcome,
    optionsKey?: string,
  ): void {
    this.tableChecks.set(name, { outcome, key: this.checkKey(optionsKey) });
  }

  /**
   * The recorded outcome when it ran with the same options, otherwise a
   * fresh run that replaces it.
   */
  async ensureTableCheck(
    name: TableCheckName,
    optionsKey: string | undefined,
    run: () => Promise<TableCheckOutcome>,
  ): Promise<TableCheckOutcome> {
    const recorded = this.tableChecks.get(name);
    if (recorded && recorded.key === this.checkKey(optionsKey)) {
      return recorded.outcome;
    }
    const outcome = await run();
    this.recordTableCheck(name, outcome, optionsKey);
    return outcome;
  }

  requireTableCheck(name: TableCheckName): TableCheckOutcome {
    const recorded = this.tableChecks.get(name);
    if (!recorded) {
      throw missing(`table check '${name}'`);
    }
    return recorded.outcome;
  }

  recordJobFailures(name: JobCheckName, failures: FailureRecord[]): void {
    this.jobFailures.set(name, failures);
  }

  requireJobFailures(name: JobCheckName): FailureRecord[] {
    const failures = this.jobFailures.get(name);
    if (!failures) {
      throw missing(`job check '${name}'`);
    }
    return failures;
  }

  requireJobs(): JobRecord[] {
    if (!this.jobs) {
      throw missing("job listing");
    }
    return this.jobs;
  }

  requireFilteredJobs(): JobRecord[] {
    if (!this.filteredJobs) {
      throw missing("filtered job listing");
    }
    return this.filteredJobs;
  }

  requireClusters(): ClusterSummary[] {
    if (!this.clusters) {
      throw missing("cluster listing");
    }
    return this.clusters;
  }

  requireTableLookup(): TableLookup {
    if (!this.tableLookup) {
      throw missing("table lookup");
    }
    return this.tableLookup;
  }

  private checkKey(optionsKey: string | undefined): string {
    return `${this.catalogSchema}|${optionsKey ?? ""}`;
  }
}

function missing(what: string): AppError {
  return new AppError(ErrorCode.SCENARIO_STATE_MISSING, undefined, {
    statusMessage: `No ${what} recorded`,
  });
}
