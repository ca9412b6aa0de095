export * from "./pipeline-config.types";
