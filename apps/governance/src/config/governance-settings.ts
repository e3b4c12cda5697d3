import { Injectable } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";

export type TableCheckErrorMode = "collect" | "abort";

/**
 * Typed view over the validated environment for the governance checks.
 * Defaults mirror `policySchema` so services also work against a bare
 * ConfigService in tests.
 */
@Injectable()
export class GovernanceSettings {
  constructor(private readonly config: ConfigService) {}

  /** Default `catalog.schema` selector for table-scoped steps. */
  get catalogSchema(): string {
    return this.config.get<string>(
      "GOVERNANCE_CATALOG_SCHEMA",
      "workspace.test_clustering",
    );
  }

  get columnDocThreshold(): number {
    return this.config.get<number>("COLUMN_DOC_THRESHOLD", 80);
  }

  get vacuumDaysThreshold(): number {
    return this.config.get<number>("VACUUM_DAYS_THRESHOLD", 30);
  }

  get orphanDaysThreshold(): number {
    return this.config.get<number>("ORPHAN_DAYS_THRESHOLD", 90);
  }

  get minTimeoutSeconds(): number {
    return this.config.get<number>("MIN_TIMEOUT_SECONDS", 300);
  }

  get maxTimeoutSeconds(): number {
    return this.config.get<number>("MAX_TIMEOUT_SECONDS", 86_400);
  }

  get tableCheckConcurrency(): number {
    return this.config.get<number>("TABLE_CHECK_CONCURRENCY", 4);
  }

  get tableCheckErrorMode(): TableCheckErrorMode {
    return this.config.get<TableCheckErrorMode>(
      "TABLE_CHECK_ERROR_MODE",
      "collect",
    );
  }

  get skipTestSetup(): boolean {
    return this.config.get<boolean>("SKIP_TEST_SETUP", false);
  }

  get skipTestTeardown(): boolean {
    return this.config.get<boolean>("SKIP_TEST_TEARDOWN", false);
  }
}
