export * from "./env.schema";
