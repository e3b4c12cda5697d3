import { Injectable, Logger } from "@nestjs/common";

import { AppError, ErrorCode } from "../../common/errors";
import { DatabricksApiService } from "../databricks-api.service";
import { DATABRICKS_TIMEOUTS } from "../http-timeout.config";
import { jobSchema, listJobsResponseSchema } from "../types/job";
import type { Job, ListJobsResponse } from "../types/job";

const JOBS_PATH = "/api/2.1/jobs";
const PAGE_SIZE = 100;
const MAX_PAGES = 500;

export interface ListJobsOptions {
  /** Single page of at most this many jobs (used by permission checks). */
  limit?: number;
}

@Injectable()
export class JobsService {
  private readonly logger = new Logger(JobsService.name);

  constructor(private readonly api: DatabricksApiService) {}

  /**
   * Lists every job in the workspace (tasks expanded), following
   * `next_page_token` until the listing is exhausted.
   */
  async list(options: ListJobsOptions = {}): Promise<Job[]> {
    if (options.limit !== undefined) {
      const page = await this.fetchPage(options.limit, undefined);
      return page.jobs;
    }

    const jobs: Job[] = [];
    let pageToken: string | undefined;
    let page = 0;

    do {
      page++;
      if (page > MAX_PAGES) {
        throw new AppError(ErrorCode.PAGINATION_EXCEEDED, undefined, {
          operation: "jobs/list",
          maxPages: MAX_PAGES,
        });
      }

      const response = await this.fetchPage(PAGE_SIZE, pageToken);
      jobs.push(...response.jobs);
      pageToken = response.has_more === false ? undefined : response.next_page_token;
    } while (pageToken);

    this.logger.debug({ message: "Listed jobs", count: jobs.length, pages: page });
    return jobs;
  }

  async get(jobId: number): Promise<Job> {
    const data = await this.api.request<unknown>(
      { method: "GET", url: `${JOBS_PATH}/get`, params: { job_id: jobId } },
      DATABRICKS_TIMEOUTS.METADATA,
    );
    const parsed = jobSchema.safeParse(data);
    if (!parsed.success) {
      throw new AppError(ErrorCode.METADATA_MALFORMED, parsed.error, {
        operation: "jobs/get",
        identifier: String(jobId),
      });
    }
    return parsed.data;
  }

  private async fetchPage(
    limit: number,
    pageToken: string | undefined,
  ): Promise<ListJobsResponse> {
    const data = await this.api.request<unknown>(
      {
        method: "GET",
        url: `${JOBS_PATH}/list`,
        params: {
          limit,
          expand_tasks: true,
          ...(pageToken ? { page_token: pageToken } : {}),
        },
      },
      DATABRICKS_TIMEOUTS.METADATA,
    );
    const parsed = listJobsResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new AppError(ErrorCode.METADATA_MALFORMED, parsed.error, {
        operation: "jobs/list",
      });
    }
    return parsed.data;
  }
}
