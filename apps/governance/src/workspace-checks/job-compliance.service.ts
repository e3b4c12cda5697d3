import { JobsService } from "@dbx-governance/backend-shared";
import type { JobSettings } from "@dbx-governance/backend-shared";
import { Injectable, Logger } from "@nestjs/common";

import { GovernanceSettings } from "../config/governance-settings";
import {
  checkClusterConfiguration,
  checkRetryConfiguration,
  checkRetryOnTimeout,
  checkServicePrincipal,
  checkTimeoutConfiguration,
  collectFailures,
  isProductionJob,
  matchesNamePattern,
} from "../policies";
import type { FailureRecord, PolicyResult, TimeoutBounds } from "../policies";

export interface JobRecord {
  jobId: number;
  name: string;
  settings: JobSettings;
}

export type JobCheck = (settings: JobSettings) => PolicyResult;

@Injectable()
export class JobComplianceService {
  private readonly logger = new Logger(JobComplianceService.name);

  constructor(
    private readonly jobs: JobsService,
    private readonly settings: GovernanceSettings,
  ) {}

  /**
   * Every job with its full settings. The list endpoint leaves out `run_as`,
   * so each job is read individually.
   */
  async loadJobs(): Promise<JobRecord[]> {
    const listed = await this.jobs.list();
    const records: JobRecord[] = [];
    for (const summary of listed) {
      const job = await this.jobs.get(summary.job_id);
      records.push({
        jobId: job.job_id,
        name: job.settings.name ?? `job-${job.job_id}`,
        settings: job.settings,
      });
    }
    this.logger.log({ message: "Loaded jobs", count: records.length });
    return records;
  }

  /** Throws when the jobs API cannot be listed. */
  async checkAccess(): Promise<void> {
    await this.jobs.list({ limit: 1 });
  }

  filterByName(jobs: readonly JobRecord[], pattern: string): JobRecord[] {
    return jobs.filter((job) => matchesNamePattern(job.name, pattern));
  }

  filterProduction(jobs: readonly JobRecord[]): JobRecord[] {
    return jobs.filter((job) => isProductionJob(job.name));
  }

  evaluate(jobs: readonly JobRecord[], check: JobCheck): FailureRecord[] {
    return collectFailures(
      jobs,
      (job) => job.name,
      (job) => check(job.settings),
    );
  }

  /** Jobs running as a user account (an email address). */
  userAccountFailures(jobs: readonly JobRecord[]): FailureRecord[] {
    return this.evaluate(jobs, checkServicePrincipal).filter((failure) =>
      failure.issue.includes("@"),
    );
  }

  servicePrincipalFailures(jobs: readonly JobRecord[]): FailureRecord[] {
    return this.evaluate(jobs, checkServicePrincipal);
  }

  retryFailures(jobs: readonly JobRecord[]): FailureRecord[] {
    return this.evaluate(jobs, checkRetryConfiguration);
  }

  retryOnTimeoutFailures(jobs: readonly JobRecord[]): FailureRecord[] {
    return this.evaluate(jobs, checkRetryOnTimeout);
  }

  timeoutFailures(
    jobs: readonly JobRecord[],
    bounds: TimeoutBounds = this.timeoutBounds,
  ): FailureRecord[] {
    return this.evaluate(jobs, (settings) => checkTimeoutConfiguration(settings, bounds));
  }

  clusterFailures(jobs: readonly JobRecord[]): FailureRecord[] {
    return this.evaluate(jobs, checkClusterConfiguration);
  }

  get timeoutBounds(): TimeoutBounds {
    return {
      minSeconds: this.settings.minTimeoutSeconds,
      maxSeconds: this.settings.maxTimeoutSeconds,
    };
  }
}
