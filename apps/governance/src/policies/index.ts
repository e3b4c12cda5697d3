export * from "./cluster.policy";
export * from "./clustering.policy";
export * from "./documentation.policy";
export * from "./job.policy";
export * from "./maintenance.policy";
export * from "./metadata.policy";
export * from "./performance.policy";
export * from "./policy-result";
