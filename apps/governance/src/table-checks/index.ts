export * from "./table-check.types";
export * from "./table-checks.module";
export * from "./table-compliance.service";
export * from "./table-detail";
export * from "./table-enumerator";
export * from "./table-metadata.service";
export * from "./table-policy-iterator";
export * from "./table-ref";
