import { Injectable } from "@nestjs/common";

import { JobComplianceService } from "../../workspace-checks/job-compliance.service";
import type { JobRecord } from "../../workspace-checks/job-compliance.service";
import { assertNoFailures } from "../policy-assertion.error";
import type { ScenarioContext } from "../scenario-context";
import type { StepBindings, StepRegistry } from "../step-registry";

@Injectable()
export class JobComplianceSteps implements StepBindings {
  constructor(private readonly compliance: JobComplianceService) {}

  register(registry: StepRegistry): void {
    registry.define("I have permissions to list and describe jobs", async (context) => {
      await this.compliance.checkAccess();
      context.permissions.add("jobs");
    });

    for (const expression of [
      "I check all jobs in the workspace",
      "I check each job's timeout configuration",
      "I check each job's cluster configuration",
    ]) {
      registry.define(expression, async (context) => {
        await this.loadJobs(context);
      });
    }

    registry.define("I check jobs with {string} in their name", async (context, args) => {
      const jobs = await this.loadJobs(context);
      context.filteredJobs = this.compliance.filterByName(jobs, args.text(0));
    });

    registry.define("I check production jobs", async (context) => {
      const jobs = await this.loadJobs(context);
      context.filteredJobs = this.compliance.filterProduction(jobs);
    });

    registry.define('no job should have a run_as containing "@"', (context) => {
      const failures = this.compliance.userAccountFailures(context.requireJobs());
      context.recordJobFailures("userAccounts", failures);
      assertNoFailures("Jobs running as user accounts", failures);
    });

    registry.define(
      "jobs with {string} in the name must have service principal",
      (context, args) => {
        const pattern = args.text(0);
        const jobs = this.compliance.filterByName(context.requireJobs(), pattern);
        const failures = this.compliance.servicePrincipalFailures(jobs);
        context.recordJobFailures("servicePrincipal", failures);
        assertNoFailures(`Jobs matching "${pattern}" without a service principal`, failures);
      },
    );

    registry.define("each production job should have max_retries > 0", (context) => {
      const failures = this.compliance.retryFailures(context.requireFilteredJobs());
      context.recordJobFailures("retries", failures);
      assertNoFailures("Jobs with inadequate retry configuration", failures);
    });

    registry.define("retry_on_timeout should be true", (context) => {
      const failures = this.compliance.retryOnTimeoutFailures(context.requireFilteredJobs());
      context.recordJobFailures("retryOnTimeout", failures);
      assertNoFailures("Jobs without retry_on_timeout", failures);
    });

    registry.define("each job should have timeout_seconds defined", (context) => {
      const failures = this.compliance.timeoutFailures(context.requireJobs());
      context.recordJobFailures("timeout", failures);
      assertNoFailures("Jobs with timeout issues", failures);
    });

    registry.define(
      "timeout_seconds should be between {int} and {int}",
      (context, args) => {
        const bounds = {
          minSeconds: args.int(0),
          maxSeconds: args.int(1),
        };
        const failures = this.compliance.timeoutFailures(context.requireJobs(), bounds);
        context.recordJobFailures("timeoutRange", failures);
        assertNoFailures(
          `Jobs with timeout outside ${bounds.minSeconds}s-${bounds.maxSeconds}s`,
          failures,
        );
      },
    );

    registry.define("jobs should use new_cluster configuration", (context) => {
      const failures = this.compliance.clusterFailures(context.requireJobs());
      context.recordJobFailures("cluster", failures);
      assertNoFailures("Jobs with cluster configuration issues", failures);
    });

    for (const expression of [
      "should not reference existing_cluster_id",
      'Unless tagged with "interactive" or "debug"',
    ]) {
      registry.define(expression, (context) => {
        assertNoFailures(
          "Jobs with cluster configuration issues",
          context.requireJobFailures("cluster"),
        );
      });
    }
  }

  private async loadJobs(context: ScenarioContext): Promise<JobRecord[]> {
    const jobs = await this.compliance.loadJobs();
    context.jobs = jobs;
    return jobs;
  }
}
