import type { Job, JobSettings, JobTask } from "@dbx-governance/backend-shared";

import { getNextJobId } from "../setup/reset";

/**
 * A job that passes every job policy: service principal, retries, a
 * one-hour timeout and a task on a new cluster.
 */
export function createJob(
  settings: Partial<JobSettings> = {},
  overrides: Partial<Omit<Job, "settings">> = {},
): Job {
  const id = getNextJobId();
  return {
    job_id: id,
    creator_user_name: "owner@example.com",
    ...overrides,
    settings: {
      name: `job-${id}`,
      run_as: { service_principal_name: "11111111-2222-3333-4444-555555555555" },
      tags: {},
      tasks: [createTask({ task_key: `task-${id}` })],
      timeout_seconds: 3600,
      max_retries: 2,
      retry_on_timeout: true,
      ...settings,
    },
  };
}

export function createTask(overrides: Partial<JobTask> = {}): JobTask {
  return {
    task_key: "main",
    new_cluster: { spark_version: "15.4.x-scala2.12", num_workers: 1 },
    ...overrides,
  };
}
