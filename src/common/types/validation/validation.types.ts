import type { ReadingField } from "../core";

/**
 * Fields whose null counts are checked. `wind_speed` is optional.
 */
export const NULL_CHECKED_FIELDS = ["power", "rainfall", "temperature", "solar_radiation"] as const satisfies
  readonly ReadingField[];

export type NullCheckedField = (typeof NULL_CHECKED_FIELDS)[number];

/**
 * Everything the validator computed for a day, whether or not it was accepted.
 */
export interface ValidationDiagnostics {
  pointCount: number;
  minimumPoints: number;
  irregularIntervals: number;
  nullCounts: Record<NullCheckedField, number>;
  powerOutliers: number;
  failedRules: string[];
}

export type ValidationVerdict =
  | { accepted: true; diagnostics: ValidationDiagnostics }
  | { accepted: false; reason: string; diagnostics: ValidationDiagnostics };
