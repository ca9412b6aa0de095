export * from "./validation.types";
