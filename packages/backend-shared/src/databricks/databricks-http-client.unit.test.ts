import axios from "axios";
import { beforeEach, describe, expect, it, vi } from "vitest";

import { AppError, ErrorCode } from "../common/errors";
import { DatabricksHttpClient } from "./databricks-http-client";
import { DATABRICKS_TIMEOUTS } from "./http-timeout.config";

vi.mock("axios");

function rejectWithStatus(
  status: number,
  data: unknown,
  headers: Record<string, string> = {},
) {
  vi.mocked(axios.request).mockRejectedValue({
    isAxiosError: true,
    response: { status, data, headers },
    config: { url: "/api/2.0/sql/statements?x=1" },
  });
  vi.mocked(axios.isAxiosError).mockReturnValue(true);
}

describe("DatabricksHttpClient", () => {
  let client: DatabricksHttpClient;

  beforeEach(() => {
    client = new DatabricksHttpClient();
    vi.clearAllMocks();
  });

  it("returns response data on success", async () => {
    vi.mocked(axios.request).mockResolvedValue({ data: { jobs: [] } });

    await expect(client.request({ url: "/api/2.1/jobs/list" })).resolves.toEqual({
      jobs: [],
    });
  });

  it("applies the default timeout", async () => {
    vi.mocked(axios.request).mockResolvedValue({ data: {} });

    await client.request({ url: "/test" });

    expect(axios.request).toHaveBeenCalledWith(
      expect.objectContaining({ timeout: DATABRICKS_TIMEOUTS.DEFAULT }),
    );
  });

  it("applies a custom timeout", async () => {
    vi.mocked(axios.request).mockResolvedValue({ data: {} });

    await client.request({ url: "/test" }, DATABRICKS_TIMEOUTS.TOKEN);

    expect(axios.request).toHaveBeenCalledWith(
      expect.objectContaining({ timeout: 15_000 }),
    );
  });

  it.each([
    [400, ErrorCode.DATABRICKS_BAD_REQUEST],
    [401, ErrorCode.DATABRICKS_AUTH_FAILED],
    [403, ErrorCode.DATABRICKS_FORBIDDEN],
    [404, ErrorCode.DATABRICKS_NOT_FOUND],
    [429, ErrorCode.DATABRICKS_RATE_LIMITED],
    [503, ErrorCode.DATABRICKS_SERVER_ERROR],
    [418, ErrorCode.DATABRICKS_BAD_REQUEST],
  ])("maps %i status to %s", async (status, code) => {
    rejectWithStatus(status, "nope");

    await expect(client.request({ url: "/test" })).rejects.toMatchObject({
      code,
    });
  });

  it("puts the Databricks error body into the context", async () => {
    rejectWithStatus(404, {
      error_code: "RESOURCE_DOES_NOT_EXIST",
      message: "Job 7 does not exist.",
    });

    await expect(client.request({ url: "/test" })).rejects.toMatchObject({
      context: {
        status: "404",
        operation: "/api/2.0/sql/statements",
        statusMessage: "RESOURCE_DOES_NOT_EXIST: Job 7 does not exist.",
      },
    });
  });

  it("reads retry-after for rate limits", async () => {
    rejectWithStatus(429, "slow down", { "retry-after": "12" });

    await expect(client.request({ url: "/test" })).rejects.toMatchObject({
      code: ErrorCode.DATABRICKS_RATE_LIMITED,
      extensions: { retryAfter: 12 },
    });
  });

  it("maps ECONNABORTED to DATABRICKS_SERVER_ERROR", async () => {
    vi.mocked(axios.request).mockRejectedValue({
      isAxiosError: true,
      code: "ECONNABORTED",
      config: { url: "/test" },
    });
    vi.mocked(axios.isAxiosError).mockReturnValue(true);

    await expect(client.request({ url: "/test" })).rejects.toMatchObject({
      code: ErrorCode.DATABRICKS_SERVER_ERROR,
      context: { statusMessage: "Request timed out" },
    });
  });

  it("passes through existing AppError", async () => {
    const existing = new AppError(ErrorCode.CONFIG_ERROR);
    vi.mocked(axios.request).mockRejectedValue(existing);

    await expect(client.request({ url: "/test" })).rejects.toBe(existing);
  });

  it("wraps non-axios errors", async () => {
    vi.mocked(axios.request).mockRejectedValue(new Error("socket hang up"));
    vi.mocked(axios.isAxiosError).mockReturnValue(false);

    await expect(client.request({ url: "/test" })).rejects.toMatchObject({
      code: ErrorCode.DATABRICKS_SERVER_ERROR,
      context: { statusMessage: "socket hang up" },
    });
  });
});
