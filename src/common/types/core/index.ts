/**
 * Unified index for core pipeline type definitions.
 */

export * from "./reading.types";
export * from "./result.types";
