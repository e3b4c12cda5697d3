import { Injectable } from "@nestjs/common";

import { AppError, ErrorCode } from "../../common/errors";
import { DatabricksApiService } from "../databricks-api.service";
import { DATABRICKS_TIMEOUTS } from "../http-timeout.config";
import { listClustersResponseSchema } from "../types/cluster";
import type { ClusterSummary } from "../types/cluster";

const PAGE_SIZE = 100;
const MAX_PAGES = 100;

@Injectable()
export class ClustersService {
  constructor(private readonly api: DatabricksApiService) {}

  async list(): Promise<ClusterSummary[]> {
    const clusters: ClusterSummary[] = [];
    let pageToken: string | undefined;
    let page = 0;

    do {
      page++;
      if (page > MAX_PAGES) {
        throw new AppError(ErrorCode.PAGINATION_EXCEEDED, undefined, {
          operation: "clusters/list",
          maxPages: MAX_PAGES,
        });
      }

      const data = await this.api.request<unknown>(
        {
          method: "GET",
          url: "/api/2.1/clusters/list",
          params: {
            page_size: PAGE_SIZE,
            ...(pageToken ? { page_token: pageToken } : {}),
          },
        },
        DATABRICKS_TIMEOUTS.METADATA,
      );
      const parsed = listClustersResponseSchema.safeParse(data);
      if (!parsed.success) {
        throw new AppError(ErrorCode.METADATA_MALFORMED, parsed.error, {
          operation: "clusters/list",
        });
      }

      clusters.push(...parsed.data.clusters);
      pageToken = parsed.data.next_page_token || undefined;
    } while (pageToken);

    return clusters;
  }
}
