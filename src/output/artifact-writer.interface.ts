import type { PipelineConfig } from "@/common/types/config";
import type { DateKey, MonthKey, Reading } from "@/common/types/core";

/**
 * Persists month and range datasets. Resolves to the path written.
 */
export interface ArtifactWriter {
  writeMonth(month: MonthKey, readings: readonly Reading[], config: PipelineConfig): Promise<string>;
  writeRange(start: DateKey, end: DateKey, readings: readonly Reading[], config: PipelineConfig): Promise<string>;
}

export const ARTIFACT_WRITER = Symbol("ARTIFACT_WRITER");
