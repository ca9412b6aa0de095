/**
 * Calendar helpers. Date keys are `yyyy-MM-dd`, month keys `yyyy-MM`, both in local calendar terms.
 */

import {
  addDays,
  eachDayOfInterval,
  eachMonthOfInterval,
  endOfMonth,
  format,
  isBefore,
  isValid,
  max as latest,
  min as earliest,
  parse,
  startOfDay,
  startOfMonth,
} from "date-fns";
import type { DateKey, MonthKey } from "../types/core";

const DATE_KEY_FORMAT = "yyyy-MM-dd";
const MONTH_KEY_FORMAT = "yyyy-MM";
const DATE_KEY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const MONTH_KEY_PATTERN = /^\d{4}-\d{2}$/;

export function toDateKey(date: Date): DateKey {
  return format(date, DATE_KEY_FORMAT);
}

export function toMonthKey(date: Date): MonthKey {
  return format(date, MONTH_KEY_FORMAT);
}

/**
 * Strict parse: rejects other layouts and impossible dates such as 2024-02-30.
 */
export function parseDateKey(value: string): Date | undefined {
  if (!DATE_KEY_PATTERN.test(value)) return undefined;
  const parsed = parse(value, DATE_KEY_FORMAT, new Date());
  return isValid(parsed) && toDateKey(parsed) === value ? parsed : undefined;
}

export function parseMonthKey(value: string): Date | undefined {
  if (!MONTH_KEY_PATTERN.test(value)) return undefined;
  const parsed = parse(value, MONTH_KEY_FORMAT, new Date());
  return isValid(parsed) && toMonthKey(parsed) === value ? parsed : undefined;
}

function requireDate(value: string, parser: (value: string) => Date | undefined): Date {
  const parsed = parser(value);
  if (!parsed) {
    throw new RangeError(`Invalid calendar key: ${value}`);
  }
  return parsed;
}

/**
 * Months touched by the inclusive date range, in order.
 */
export function monthsInRange(start: DateKey, end: DateKey): MonthKey[] {
  const from = requireDate(start, parseDateKey);
  const to = requireDate(end, parseDateKey);
  if (isBefore(to, from)) return [];
  return eachMonthOfInterval({ start: from, end: to }).map(toMonthKey);
}

/**
 * Days of `month` that lie inside the inclusive range and strictly before the day containing `now`.
 */
export function eligibleDaysOfMonth(month: MonthKey, rangeStart: DateKey, rangeEnd: DateKey, now: Date): DateKey[] {
  const monthStart = requireDate(month, parseMonthKey);
  const from = latest([startOfMonth(monthStart), requireDate(rangeStart, parseDateKey)]);
  const to = earliest([endOfMonth(monthStart), requireDate(rangeEnd, parseDateKey)]);
  if (isBefore(to, from)) return [];

  const today = startOfDay(now);
  return eachDayOfInterval({ start: from, end: to })
    .filter(day => isBefore(day, today))
    .map(toDateKey);
}

/**
 * Half-open epoch-millisecond window `[start, end)` covering the local calendar day.
 */
export function dayWindow(date: DateKey): { start: number; end: number } {
  const day = requireDate(date, parseDateKey);
  return { start: day.getTime(), end: addDays(day, 1).getTime() };
}
