import { ConfigService } from "@nestjs/config";
import { z } from "zod";

import { AppError, ErrorCode } from "../common/errors";
import { DatabricksHttpClient } from "./databricks-http-client";
import { DATABRICKS_TIMEOUTS } from "./http-timeout.config";

export interface DatabricksAuthProvider {
  /** Value for the Authorization header of the next request. */
  getAuthorizationHeader(): Promise<string>;

  invalidateToken(): void;
}

export const DATABRICKS_AUTH_PROVIDER = "DATABRICKS_AUTH_PROVIDER";

/** Tokens are refreshed this long before the server-side expiry. */
const EXPIRY_SKEW_MS = 60_000;

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().default("Bearer"),
  expires_in: z.coerce.number().positive(),
});

export class PersonalAccessTokenProvider implements DatabricksAuthProvider {
  constructor(private readonly token: string) {}

  async getAuthorizationHeader(): Promise<string> {
    return `Bearer ${this.token}`;
  }

  invalidateToken(): void {
    // Static token; nothing to refresh.
  }
}

/**
 * OAuth machine-to-machine (client credentials) against the workspace's
 * `/oidc/v1/token` endpoint. The access token is held in memory until shortly
 * before it expires. Concurrent callers share one token request.
 */
export class OAuthClientCredentialsProvider implements DatabricksAuthProvider {
  private cached: { header: string; expiresAt: number } | undefined;
  private pending: Promise<string> | undefined;

  constructor(
    private readonly host: string,
    private readonly clientId: string,
    private readonly clientSecret: string,
    private readonly httpClient: DatabricksHttpClient,
    private readonly now: () => number = Date.now,
  ) {}

  async getAuthorizationHeader(): Promise<string> {
    if (this.cached && this.cached.expiresAt > this.now()) {
      return this.cached.header;
    }
    if (!this.pending) {
      this.pending = this.requestToken().finally(() => {
        this.pending = undefined;
      });
    }
    return this.pending;
  }

  invalidateToken(): void {
    this.cached = undefined;
  }

  private async requestToken(): Promise<string> {
    const body = new URLSearchParams({
      grant_type: "client_credentials",
      scope: "all-apis",
    });
    const data = await this.httpClient.request<unknown>(
      {
        method: "POST",
        baseURL: this.host,
        url: "/oidc/v1/token",
        auth: { username: this.clientId, password: this.clientSecret },
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        data: body.toString(),
      },
      DATABRICKS_TIMEOUTS.TOKEN,
    );

    const parsed = tokenResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new AppError(ErrorCode.DATABRICKS_AUTH_FAILED, parsed.error, {
        operation: "/oidc/v1/token",
        statusMessage: "Token response is missing access_token or expires_in",
      });
    }

    const header = `${parsed.data.token_type} ${parsed.data.access_token}`;
    this.cached = {
      header,
      expiresAt: this.now() + parsed.data.expires_in * 1000 - EXPIRY_SKEW_MS,
    };
    return header;
  }
}

export function normalizeHost(host: string): string {
  return host.replace(/\/+$/, "");
}

/**
 * Picks the auth strategy from configuration: a personal access token wins
 * over OAuth client credentials when both are present.
 */
export function createDatabricksAuthProvider(
  configService: ConfigService,
  httpClient: DatabricksHttpClient,
): DatabricksAuthProvider {
  const token = configService.get<string>("DATABRICKS_TOKEN");
  if (token) {
    return new PersonalAccessTokenProvider(token);
  }

  const host = configService.get<string>("DATABRICKS_HOST");
  const clientId = configService.get<string>("DATABRICKS_CLIENT_ID");
  const clientSecret = configService.get<string>("DATABRICKS_CLIENT_SECRET");
  if (host && clientId && clientSecret) {
    return new OAuthClientCredentialsProvider(
      normalizeHost(host),
      clientId,
      clientSecret,
      httpClient,
    );
  }

  throw new AppError(ErrorCode.DATABRICKS_CREDENTIALS_MISSING);
}
