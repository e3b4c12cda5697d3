export * from "./cluster-compliance.service";
export * from "./job-compliance.service";
export * from "./workspace-checks.module";
