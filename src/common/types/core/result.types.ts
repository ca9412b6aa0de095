import type { DataType, DateKey, MonthKey, Reading } from "./reading.types";

/**
 * Where the readings of an accepted day came from.
 */
export type DaySource = "cache" | "fetched" | "mixed";

export interface AcceptedDay {
  date: DateKey;
  status: "accepted";
  readings: Reading[];
  source: DaySource;
}

export interface RejectedDay {
  date: DateKey;
  status: "rejected";
  reason: string;
  failedTypes?: DataType[];
}

/**
 * Outcome of one day's orchestration. A rejected day contributes no rows.
 */
export type DayResult = AcceptedDay | RejectedDay;

export interface DayRejection {
  date: DateKey;
  reason: string;
}

export interface MonthResult {
  month: MonthKey;
  readings: Reading[];
  acceptedDays: DateKey[];
  rejectedDays: DayRejection[];
  artifactPath?: string;
}

export interface MonthSummary {
  month: MonthKey;
  rows: number;
  acceptedDays: number;
  rejectedDays: number;
  failed: boolean;
}

export interface RangeResult {
  start: DateKey;
  end: DateKey;
  readings: Reading[];
  months: MonthSummary[];
  acceptedDays: number;
  rejectedDays: DayRejection[];
  artifactPath?: string;
  durationMs: number;
}
