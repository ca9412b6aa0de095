import type { PipelineConfig } from "@/common/types/config";
import type { DataType, DateKey, PartialReading } from "@/common/types/core";

/**
 * A source of timestamped readings for one (data type, date) pair.
 *
 * Resolves to an empty collection when the source has no data for the day.
 * Rejects with a `NetworkError`, `SourceError` or `ParseError`.
 */
export interface RemoteDataSource {
  readonly sourceName: string;
  read(dataType: DataType, date: DateKey, config: PipelineConfig): Promise<PartialReading[]>;
}

export const REMOTE_DATA_SOURCE = Symbol("REMOTE_DATA_SOURCE");
