import type { DataType, DateKey, PartialReading } from "../core";
import type { PipelineConfig } from "../config";

/**
 * Raw per-day, per-type payload as it is cached.
 */
export type CachePayload = PartialReading[];

/**
 * One persisted record. `storedAt` is epoch milliseconds and drives expiry.
 */
export interface CacheEntry {
  dataType: DataType;
  date: DateKey;
  storedAt: number;
  payload: CachePayload;
}

/**
 * Keyed, TTL-expiring persistence for raw payloads.
 */
export interface CacheStore {
  get(dataType: DataType, date: DateKey, config: PipelineConfig): Promise<CachePayload | undefined>;
  put(dataType: DataType, date: DateKey, payload: CachePayload, config: PipelineConfig): Promise<void>;
  sweep(config: PipelineConfig): Promise<number>;
}

export interface CacheStats {
  hits: number;
  misses: number;
  expired: number;
  corrupt: number;
  writes: number;
  swept: number;
}
