export * from "./pipeline.errors";
