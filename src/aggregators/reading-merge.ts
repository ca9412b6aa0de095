import { READING_FIELDS, type PartialReading, type Reading } from "@/common/types/core";

function emptyReading(timestamp: number): Reading {
  return {
    timestamp,
    power: null,
    rainfall: null,
    temperature: null,
    solar_radiation: null,
    wind_speed: null,
  };
}

/**
 * Outer join of per-type collections on timestamp. Fields no collection supplies
 * stay null; a field supplied twice for the same timestamp keeps the later value.
 * The result is sorted ascending.
 */
export function mergeByTimestamp(collections: readonly (readonly PartialReading[])[]): Reading[] {
  const byTimestamp = new Map<number, Reading>();

  for (const collection of collections) {
    for (const partial of collection) {
      const reading = byTimestamp.get(partial.timestamp) ?? emptyReading(partial.timestamp);
      for (const field of READING_FIELDS) {
        const value = partial[field];
        if (value !== undefined) {
          reading[field] = value;
        }
      }
      byTimestamp.set(partial.timestamp, reading);
    }
  }

  return sortByTimestamp(Array.from(byTimestamp.values()));
}

/**
 * Drop duplicate timestamps, keeping the last-seen reading, and sort ascending.
 */
export function dedupeAndSort(readings: readonly Reading[]): Reading[] {
  const byTimestamp = new Map<number, Reading>();
  for (const reading of readings) {
    byTimestamp.set(reading.timestamp, reading);
  }
  return sortByTimestamp(Array.from(byTimestamp.values()));
}

/**
 * Append already-sorted sets in the given order without re-sorting.
 */
export function concatInOrder(sets: readonly (readonly Reading[])[]): Reading[] {
  return sets.flatMap(set => [...set]);
}

/**
 * Readings whose timestamp lies in `[start, end)`.
 */
export function withinWindow(readings: readonly Reading[], start: number, end: number): Reading[] {
  return readings.filter(reading => reading.timestamp >= start && reading.timestamp < end);
}

export function sortByTimestamp(readings: Reading[]): Reading[] {
  return readings.sort((a, b) => a.timestamp - b.timestamp);
}
