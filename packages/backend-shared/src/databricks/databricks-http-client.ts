import { Injectable } from "@nestjs/common";
import axios from "axios";
import type { AxiosRequestConfig } from "axios";

import { AppError } from "../common/errors/app-error";
import { ErrorCode } from "../common/errors/error-codes";
import { DATABRICKS_TIMEOUTS } from "./http-timeout.config";

const MAX_STATUS_MESSAGE_LENGTH = 500;
const MAX_CONTENT_LENGTH = 50 * 1024 * 1024; // 50 MB

function truncate(value: string, maxLength: number): string {
  return value.length <= maxLength
    ? value
    : `${value.slice(0, maxLength)}... [truncated]`;
}

function stripQueryString(url: string | undefined): string | undefined {
  if (!url) {
    return undefined;
  }
  const idx = url.indexOf("?");
  return idx === -1 ? url : url.slice(0, idx);
}

/**
 * Databricks REST errors carry `{ error_code, message }`.
 */
function extractDetail(data: unknown, status: number): string {
  if (typeof data === "string" && data.length > 0) {
    return data;
  }
  if (typeof data === "object" && data !== null) {
    const message = "message" in data ? data.message : undefined;
    const errorCode = "error_code" in data ? data.error_code : undefined;
    if (typeof message === "string") {
      return typeof errorCode === "string" ? `${errorCode}: ${message}` : message;
    }
  }
  return `Databricks request failed (${status})`;
}

function parseRetryAfter(headers: unknown): number | undefined {
  if (typeof headers !== "object" || headers === null) {
    return undefined;
  }
  const value = "retry-after" in headers ? headers["retry-after"] : undefined;
  const seconds = typeof value === "string" ? Number.parseInt(value, 10) : NaN;
  return Number.isFinite(seconds) && seconds > 0 ? seconds : undefined;
}

/**
 * Infrastructure layer HTTP client for Databricks REST calls.
 * Translates HTTP errors to AppError at the boundary.
 *
 * DatabricksApiService passes fully-configured requests (base URL and auth
 * header). This class is responsible ONLY for HTTP execution and error
 * translation. It never retries.
 */
@Injectable()
export class DatabricksHttpClient {
  /**
   * Execute HTTP request with timeout support.
   *
   * @param timeout - Request timeout in milliseconds (defaults to DATABRICKS_TIMEOUTS.DEFAULT)
   */
  async request<T>(
    config: AxiosRequestConfig,
    timeout: number = DATABRICKS_TIMEOUTS.DEFAULT,
  ): Promise<T> {
    try {
      const response = await axios.request<T>({
        ...config,
        timeout,
        maxContentLength: MAX_CONTENT_LENGTH,
      });
      return response.data;
    } catch (error) {
      throw this.translateError(error);
    }
  }

  private translateError(error: unknown): AppError {
    if (error instanceof AppError) {
      return error;
    }

    // Handle timeout errors (ECONNABORTED from axios)
    if (axios.isAxiosError(error) && error.code === "ECONNABORTED") {
      return new AppError(ErrorCode.DATABRICKS_SERVER_ERROR, error, {
        operation: stripQueryString(error.config?.url),
        statusMessage: "Request timed out",
      });
    }

    if (axios.isAxiosError(error) && error.response) {
      const { status, data, headers } = error.response;
      const code = this.mapStatusToErrorCode(status);
      const retryAfter =
        code === ErrorCode.DATABRICKS_RATE_LIMITED
          ? parseRetryAfter(headers)
          : undefined;

      return new AppError(
        code,
        error,
        {
          status: String(status),
          operation: stripQueryString(error.config?.url),
          statusMessage: truncate(
            extractDetail(data, status),
            MAX_STATUS_MESSAGE_LENGTH,
          ),
        },
        retryAfter === undefined ? undefined : { retryAfter },
      );
    }

    return new AppError(ErrorCode.DATABRICKS_SERVER_ERROR, error, {
      statusMessage: error instanceof Error ? error.message : undefined,
    });
  }

  private mapStatusToErrorCode(status: number): ErrorCode {
    switch (status) {
      case 400:
        return ErrorCode.DATABRICKS_BAD_REQUEST;
      case 401:
        return ErrorCode.DATABRICKS_AUTH_FAILED;
      case 403:
        return ErrorCode.DATABRICKS_FORBIDDEN;
      case 404:
        return ErrorCode.DATABRICKS_NOT_FOUND;
      case 429:
        return ErrorCode.DATABRICKS_RATE_LIMITED;
      default:
        return status >= 500
          ? ErrorCode.DATABRICKS_SERVER_ERROR
          : ErrorCode.DATABRICKS_BAD_REQUEST;
    }
  }
}
