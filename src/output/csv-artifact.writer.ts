import { Injectable } from "@nestjs/common";
import { promises as fs } from "fs";
import * as path from "path";
import Papa from "papaparse";
import { v4 as uuidv4 } from "uuid";
import { BaseService } from "@/common/base/base.service";
import type { PipelineConfig } from "@/common/types/config";
import { READING_FIELDS, type DateKey, type MonthKey, type Reading } from "@/common/types/core";
import type { ArtifactWriter } from "./artifact-writer.interface";

export const CSV_COLUMNS = ["timestamp", ...READING_FIELDS] as const;

/**
 * Render readings as CSV: ISO-8601 UTC timestamps, empty cells for nulls.
 */
export function toCsv(readings: readonly Reading[]): string {
  const data = readings.map(reading => [
    new Date(reading.timestamp).toISOString(),
    ...READING_FIELDS.map(field => {
      const value = reading[field];
      return value === null ? "" : String(value);
    }),
  ]);

  const csv = Papa.unparse({ fields: [...CSV_COLUMNS], data }, { newline: "\n" });
  // papaparse terminates a header-only document itself but not the last data row
  return csv.endsWith("\n") ? csv : `${csv}\n`;
}

@Injectable()
export class CsvArtifactWriter extends BaseService implements ArtifactWriter {
  static monthPath(month: MonthKey, config: PipelineConfig): string {
    return path.join(config.outputDir, "months", `${month}.csv`);
  }

  static rangePath(start: DateKey, end: DateKey, config: PipelineConfig): string {
    return path.join(config.outputDir, `readings_${start}_${end}.csv`);
  }

  async writeMonth(month: MonthKey, readings: readonly Reading[], config: PipelineConfig): Promise<string> {
    const target = CsvArtifactWriter.monthPath(month, config);
    await this.writeAtomically(target, toCsv(readings));
    this.logger.log(`Wrote ${readings.length} rows for ${month} to ${target}`);
    return target;
  }

  async writeRange(start: DateKey, end: DateKey, readings: readonly Reading[], config: PipelineConfig): Promise<string> {
    const target = CsvArtifactWriter.rangePath(start, end, config);
    await this.writeAtomically(target, toCsv(readings));
    this.logger.log(`Wrote ${readings.length} rows for ${start}..${end} to ${target}`);
    return target;
  }

  private async writeAtomically(target: string, contents: string): Promise<void> {
    await fs.mkdir(path.dirname(target), { recursive: true });
    const tempPath = `${target}.${uuidv4()}.tmp`;
    try {
      await fs.writeFile(tempPath, contents, "utf8");
      await fs.rename(tempPath, target);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }
  }
}
