import type { Period, PeriodIndex } from "./indicator.schema";

const MONTHS_PER_YEAR = 12;

/**
 * Normalizes a period to { year, index }. ISO dates become monthly periods, which only
 * make sense when the table reports monthly. Returns null for a malformed period.
 */
export function normalizePeriod(period: Period, periodsPerYear: number): PeriodIndex | null {
  if (typeof period === "string") {
    if (periodsPerYear !== MONTHS_PER_YEAR) return null;
    const year = Number(period.slice(0, 4));
    const month = Number(period.slice(5, 7));
    if (!Number.isInteger(year) || !Number.isInteger(month) || month < 1 || month > 12) return null;
    if (period.length > 7) {
      const day = Number(period.slice(8, 10));
      // day 0 of the next month is the last day of this one
      const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
      if (!Number.isInteger(day) || day < 1 || day > daysInMonth) return null;
    }
    return { year, index: month };
  }
  if (period.index < 1 || period.index > periodsPerYear) return null;
  return { year: period.year, index: period.index };
}

/** Integer ordinal used as the forecaster's period index. */
export function periodOrdinal(period: PeriodIndex, periodsPerYear: number): number {
  return period.year * periodsPerYear + (period.index - 1);
}

/** Inverse of periodOrdinal. */
export function periodFromOrdinal(ordinal: number, periodsPerYear: number): PeriodIndex {
  const year = Math.floor(ordinal / periodsPerYear);
  return { year, index: ordinal - year * periodsPerYear + 1 };
}

/** Stable label for logs and error messages, e.g. "2024-P03" or the raw date string. */
export function formatPeriod(period: unknown): string {
  if (typeof period === "string") return period;
  if (period != null && typeof period === "object" && "year" in period && "index" in period) {
    const { year, index } = period;
    return `${String(year)}-P${String(index).padStart(2, "0")}`;
  }
  return String(period);
}
