import { Inject, Injectable } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import type { AxiosRequestConfig } from "axios";

import { AppError, ErrorCode } from "../common/errors";
import {
  DATABRICKS_AUTH_PROVIDER,
  normalizeHost,
} from "./databricks-auth.provider";
import type { DatabricksAuthProvider } from "./databricks-auth.provider";
import { DatabricksHttpClient } from "./databricks-http-client";

/**
 * Authenticated entry point for workspace REST calls. Resolves the workspace
 * host and Authorization header, then hands the request to the HTTP client.
 *
 * A 401 drops the cached token so the next call authenticates again; the
 * failed call itself is not repeated.
 */
@Injectable()
export class DatabricksApiService {
  constructor(
    @Inject(DATABRICKS_AUTH_PROVIDER)
    private readonly authProvider: DatabricksAuthProvider,
    private readonly httpClient: DatabricksHttpClient,
    private readonly configService: ConfigService,
  ) {}

  get host(): string {
    const host = this.configService.get<string>("DATABRICKS_HOST");
    if (!host) {
      throw new AppError(ErrorCode.CONFIG_ERROR, undefined, {
        statusMessage: "DATABRICKS_HOST is not set",
      });
    }
    return normalizeHost(host);
  }

  /**
   * @param timeout - Operation-specific timeout in milliseconds (defaults to DATABRICKS_TIMEOUTS.DEFAULT)
   */
  async request<T = unknown>(
    config: AxiosRequestConfig,
    timeout?: number,
  ): Promise<T> {
    const authorization = await this.authProvider.getAuthorizationHeader();

    try {
      return await this.httpClient.request<T>(
        {
          ...config,
          baseURL: config.baseURL ?? this.host,
          headers: {
            ...config.headers,
            Authorization: authorization,
          },
        },
        timeout,
      );
    } catch (error) {
      if (
        error instanceof AppError &&
        error.code === ErrorCode.DATABRICKS_AUTH_FAILED
      ) {
        this.authProvider.invalidateToken();
      }
      throw error;
    }
  }
}
