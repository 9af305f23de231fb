/**
 * Period Labels
 *
 * Calendar buckets are `YYYY` (year granularity) or `YYYY-MM` (month
 * granularity). Labels sort lexicographically in calendar order.
 */

import { format } from "date-fns";
import type { Granularity } from "./config";

export const UNKNOWN_PERIOD = "unknown";

export function periodLabel(date: Date, granularity: Granularity): string {
  return format(date, granularity === "year" ? "yyyy" : "yyyy-MM");
}

function parseLabel(label: string): { year: number; month: number | null } {
  const [year, month] = label.split("-");
  return {
    year: Number(year),
    month: month === undefined ? null : Number(month),
  };
}

/**
 * Sequential index of a period, so that offsets are plain subtraction.
 */
export function periodOrdinal(label: string): number {
  const { year, month } = parseLabel(label);
  return month === null ? year : year * 12 + (month - 1);
}

/**
 * Whole periods from `from` to `to` (negative when `to` is earlier).
 */
export function periodOffset(from: string, to: string): number {
  return periodOrdinal(to) - periodOrdinal(from);
}

export function nextPeriod(label: string): string {
  const { year, month } = parseLabel(label);
  if (month === null) {
    return String(year + 1);
  }
  if (month === 12) {
    return `${year + 1}-01`;
  }
  return `${year}-${(month + 1).toString().padStart(2, "0")}`;
}

export function comparePeriods(a: string, b: string): number {
  return periodOrdinal(a) - periodOrdinal(b);
}
