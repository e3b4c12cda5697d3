export * from "./factories/cluster.factory";
export * from "./factories/job.factory";
export * from "./factories/table.factory";
export * from "./fake-workspace/fake-workspace";
export * from "./setup/reset";
export * from "./stubs/databricks.stub";
export { withOverrides } from "./stubs/with-overrides";
export { fakeWorkspaceConfig } from "./stubs/workspace-config";
