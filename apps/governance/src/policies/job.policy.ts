import type { JobSettings } from "@dbx-governance/backend-shared";

import { COMPLIANT, violation } from "./policy-result";
import type { PolicyResult } from "./policy-result";

const PRODUCTION_INDICATORS = ["prod", "production", "prd"];
const CLUSTER_EXEMPT_TAGS = ["interactive", "debug"];

export interface TimeoutBounds {
  minSeconds: number;
  maxSeconds: number;
}

export interface RetrySettings {
  maxRetries: number;
  retryOnTimeout: boolean;
}

export function matchesNamePattern(name: string | undefined, pattern: string): boolean {
  return (name ?? "").toLowerCase().includes(pattern.toLowerCase());
}

export function isProductionJob(name: string | undefined): boolean {
  return PRODUCTION_INDICATORS.some((indicator) => matchesNamePattern(name, indicator));
}

/** A user identity (an email) is reported before a service principal is considered. */
export function checkServicePrincipal(settings: JobSettings): PolicyResult {
  const runAs = settings.run_as;
  if (runAs?.user_name?.includes("@")) {
    return violation(`Uses user account: ${runAs.user_name}`);
  }
  if (runAs?.service_principal_name) {
    return COMPLIANT;
  }
  return violation("No run_as configuration");
}

/**
 * Job-level retry settings. Multi-task jobs carry them per task; those count
 * only when every task sets them, taking the weakest task.
 */
export function resolveRetrySettings(settings: JobSettings): RetrySettings {
  const tasks = settings.tasks ?? [];

  let maxRetries = settings.max_retries;
  if (maxRetries === undefined && tasks.length > 0) {
    const perTask = tasks.map((task) => task.max_retries);
    if (perTask.every((value): value is number => value !== undefined)) {
      maxRetries = Math.min(...perTask);
    }
  }

  let retryOnTimeout = settings.retry_on_timeout;
  if (retryOnTimeout === undefined && tasks.length > 0) {
    const perTask = tasks.map((task) => task.retry_on_timeout);
    if (perTask.every((value): value is boolean => value !== undefined)) {
      retryOnTimeout = perTask.every(Boolean);
    }
  }

  return {
    maxRetries: maxRetries ?? 0,
    retryOnTimeout: retryOnTimeout ?? false,
  };
}

export function checkRetryOnTimeout(settings: JobSettings): PolicyResult {
  return resolveRetrySettings(settings).retryOnTimeout
    ? COMPLIANT
    : violation("retry_on_timeout is false");
}

export function checkRetryConfiguration(settings: JobSettings): PolicyResult {
  const { maxRetries, retryOnTimeout } = resolveRetrySettings(settings);
  const issues: string[] = [];
  if (maxRetries <= 0) {
    issues.push(`max_retries is ${maxRetries}`);
  }
  if (!retryOnTimeout) {
    issues.push("retry_on_timeout is false");
  }
  return issues.length > 0 ? violation(issues.join("; ")) : COMPLIANT;
}

/** `timeout_seconds: 0` is how the Jobs API spells "no timeout". */
export function checkTimeoutConfiguration(
  settings: JobSettings,
  bounds: TimeoutBounds,
): PolicyResult {
  const timeout = settings.timeout_seconds;
  if (timeout === undefined || timeout === 0) {
    return violation("No timeout configured");
  }
  if (timeout < bounds.minSeconds) {
    return violation(`Timeout too short: ${timeout}s < ${bounds.minSeconds}s`);
  }
  if (timeout > bounds.maxSeconds) {
    return violation(`Timeout too long: ${timeout}s > ${bounds.maxSeconds}s`);
  }
  return COMPLIANT;
}

export function checkClusterConfiguration(settings: JobSettings): PolicyResult {
  const tags = settings.tags ?? {};
  if (CLUSTER_EXEMPT_TAGS.some((tag) => tag in tags)) {
    return COMPLIANT;
  }
  const offending = (settings.tasks ?? []).find((task) => task.existing_cluster_id);
  if (offending) {
    return violation(`Task '${offending.task_key ?? "unknown"}' uses existing cluster`);
  }
  return COMPLIANT;
}
