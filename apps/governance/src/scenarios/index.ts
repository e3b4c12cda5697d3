export * from "./feature-parser";
export * from "./feature.types";
export * from "./governance-run.service";
export * from "./policy-assertion.error";
export * from "./scenario-context";
export * from "./scenario-runner";
export * from "./scenarios.module";
export * from "./step-registry";
