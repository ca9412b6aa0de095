import { Injectable } from "@nestjs/common";
import { BaseService } from "@/common/base/base.service";
import type { PipelineConfig } from "@/common/types/config";
import type { DateKey, Reading } from "@/common/types/core";
import {
  NULL_CHECKED_FIELDS,
  type NullCheckedField,
  type ValidationDiagnostics,
  type ValidationVerdict,
} from "@/common/types/validation";

const MS_PER_MINUTE = 60 * 1000;

export const REJECTION_REASONS = {
  NO_DATA: "no data",
  INSUFFICIENT_POINTS: "insufficient points",
  IRREGULAR_INTERVALS: "irregular intervals",
  POWER_OUTLIERS: "too many power outliers",
  tooManyNulls: (field: NullCheckedField) => `too many nulls in ${field}`,
} as const;

/**
 * Acceptance gate for one day's merged readings.
 *
 * Every rule is evaluated so the diagnostics are complete; the first failing
 * rule, in declaration order, is the rejection reason. Readings are never modified.
 */
@Injectable()
export class DayValidator extends BaseService {
  validate(daySet: readonly Reading[] | undefined, date: DateKey, config: PipelineConfig): ValidationVerdict {
    const diagnostics = this.computeDiagnostics(daySet ?? [], config);

    if (diagnostics.failedRules.length === 0) {
      return { accepted: true, diagnostics };
    }

    const reason = diagnostics.failedRules[0];
    this.logDebug(`Day ${date} rejected: ${reason}`, "Validation", diagnostics);
    return { accepted: false, reason, diagnostics };
  }

  private computeDiagnostics(daySet: readonly Reading[], config: PipelineConfig): ValidationDiagnostics {
    const tolerance = config.allowedMissingPoints;
    const minimumPoints = config.expectedPointsPerDay - tolerance;
    const failedRules: string[] = [];

    const irregularIntervals = countIrregularIntervals(daySet, config.timeIntervalMinutes * MS_PER_MINUTE);
    const nullCounts = countNulls(daySet);
    const powerOutliers = daySet.filter(
      reading => reading.power !== null && (reading.power < config.powerOutlierMin || reading.power > config.powerOutlierMax)
    ).length;

    if (daySet.length === 0) {
      failedRules.push(REJECTION_REASONS.NO_DATA);
    }
    if (daySet.length < minimumPoints) {
      failedRules.push(REJECTION_REASONS.INSUFFICIENT_POINTS);
    }
    if (irregularIntervals > tolerance) {
      failedRules.push(REJECTION_REASONS.IRREGULAR_INTERVALS);
    }
    for (const field of NULL_CHECKED_FIELDS) {
      if (nullCounts[field] > tolerance) {
        failedRules.push(REJECTION_REASONS.tooManyNulls(field));
      }
    }
    if (powerOutliers > tolerance) {
      failedRules.push(REJECTION_REASONS.POWER_OUTLIERS);
    }

    return {
      pointCount: daySet.length,
      minimumPoints,
      irregularIntervals,
      nullCounts,
      powerOutliers,
      failedRules,
    };
  }
}

function countIrregularIntervals(daySet: readonly Reading[], intervalMs: number): number {
  let irregular = 0;
  for (let i = 1; i < daySet.length; i++) {
    if (daySet[i].timestamp - daySet[i - 1].timestamp !== intervalMs) {
      irregular++;
    }
  }
  return irregular;
}

function countNulls(daySet: readonly Reading[]): Record<NullCheckedField, number> {
  const counts: Record<NullCheckedField, number> = {
    power: 0,
    rainfall: 0,
    temperature: 0,
    solar_radiation: 0,
  };
  for (const reading of daySet) {
    for (const field of NULL_CHECKED_FIELDS) {
      if (reading[field] === null) counts[field]++;
    }
  }
  return counts;
}
