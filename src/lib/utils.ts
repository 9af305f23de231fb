import { parseISO } from "date-fns";

export function formatNumber(num: number): string {
  return new Intl.NumberFormat("en-US").format(num);
}

export function formatPercentage(num: number): string {
  return `${num.toFixed(1)}%`;
}

/**
 * Percentage of `part` in `total`, 0 when the total is 0.
 */
export function percentOf(part: number, total: number): number {
  return total > 0 ? (part / total) * 100 : 0;
}

/**
 * Safely parse a timestamp that could be:
 * - Date object
 * - ISO 8601 string ("2024-01-17T14:30:45+00:00") or a date-time string
 *   ("2024-01-17 14:30"); values without an offset, date-only ones
 *   included, are local time
 * - Unix timestamp in seconds (1705502445)
 * - Unix timestamp in milliseconds (1705502445000)
 * - anything else (null, blank, booleans, objects)
 *
 * @returns timestamp in milliseconds, or null if invalid
 */
export function parseTimestamp(timestamp: unknown): number | null {
  if (timestamp == null || timestamp === "") {
    return null;
  }

  let ms: number;

  if (timestamp instanceof Date) {
    ms = timestamp.getTime();
  } else if (typeof timestamp === "string") {
    const trimmed = timestamp.trim();
    if (trimmed === "") {
      return null;
    }
    if (/^\d+$/.test(trimmed) && trimmed.length >= 9) {
      // Unix timestamp as string; shorter digit runs are not timestamps
      const numericValue = Number(trimmed);
      ms = numericValue < 1e12 ? numericValue * 1000 : numericValue;
    } else {
      ms = parseISO(trimmed).getTime();
      if (isNaN(ms)) {
        ms = new Date(trimmed).getTime();
      }
    }
  } else if (typeof timestamp === "number") {
    if (!Number.isFinite(timestamp)) {
      return null;
    }
    // Timestamps in seconds are typically 10 digits (< 1e12 ms means seconds)
    ms = timestamp < 1e12 ? timestamp * 1000 : timestamp;
  } else {
    return null;
  }

  if (isNaN(ms) || ms <= 0) {
    return null;
  }

  return ms;
}

/**
 * Parse a monetary amount. Accepts numbers and numeric strings carrying
 * thousands separators, whitespace or a leading currency symbol
 * ("$1,200.50", "NT$ 300").
 *
 * @returns the amount, or null when the value is not a number
 */
export function parseAmount(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== "string") {
    return null;
  }

  const cleaned = value
    .trim()
    .replace(/^[^\d\-+.]+/, "")
    .replace(/[,\s]/g, "");
  if (cleaned === "" || !/^[-+]?(\d+\.?\d*|\.\d+)$/.test(cleaned)) {
    return null;
  }

  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Stringify an identifier cell. Numbers keep their integer form so that
 * order 1001 read from a spreadsheet matches "1001" read from a CSV.
 */
export function toIdentifier(value: unknown): string {
  if (value == null) return "";
  if (typeof value === "string") return value.trim();
  if (typeof value === "number" || typeof value === "bigint") {
    return String(value);
  }
  if (typeof value === "boolean") return value ? "true" : "false";
  return "";
}
