export * from "./cluster";
export * from "./job";
export * from "./statement";
