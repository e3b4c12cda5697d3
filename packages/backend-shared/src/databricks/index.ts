export * from "./databricks-api.service";
export * from "./databricks-auth.provider";
export * from "./databricks-http-client";
export * from "./databricks.module";
export * from "./http-timeout.config";
export * from "./services/clusters.service";
export * from "./services/jobs.service";
export * from "./sql";
export * from "./statement-execution.service";
export * from "./types";
