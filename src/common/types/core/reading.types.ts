/**
 * Reading and data-set type definitions
 */

/**
 * Every numeric column a reading carries, in output column order.
 */
export const READING_FIELDS = ["power", "rainfall", "temperature", "solar_radiation", "wind_speed"] as const;

export type ReadingField = (typeof READING_FIELDS)[number];

/**
 * Data types served by the remote source. Each one supplies a fixed subset of the fields.
 */
export const DATA_TYPE_FIELDS = {
  power: ["power"],
  weather: ["rainfall", "temperature", "solar_radiation", "wind_speed"],
} as const satisfies Record<string, readonly ReadingField[]>;

export type DataType = keyof typeof DATA_TYPE_FIELDS;

/**
 * Data types that must all be present for a day to be assembled.
 */
export const REQUIRED_DATA_TYPES: readonly DataType[] = ["power", "weather"];

/**
 * One timestamped record. `timestamp` is epoch milliseconds (UTC).
 */
export type Reading = { timestamp: number } & Record<ReadingField, number | null>;

/**
 * A row as delivered for a single data type: only that type's fields are present.
 */
export type PartialReading = { timestamp: number } & Partial<Record<ReadingField, number | null>>;

/**
 * Calendar date in `yyyy-MM-dd` form.
 */
export type DateKey = string;

/**
 * Calendar month in `yyyy-MM` form.
 */
export type MonthKey = string;

export function isDataType(value: unknown): value is DataType {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(DATA_TYPE_FIELDS, value);
}
