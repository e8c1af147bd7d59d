import type { QueryConfig } from '../config';

export interface DateRange {
  /** Inclusive, YYYY-MM-DD. */
  startDate: string;
  /** Inclusive, YYYY-MM-DD. */
  endDate: string;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function shiftDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

/**
 * Resolves the reporting window. Explicit dates win; otherwise the window ends
 * `lag_days` before `today` so unfinalized days are left out, and spans
 * `lookback_days` back from there.
 */
export function resolveDateRange(
  config: Pick<QueryConfig, 'lookback_days' | 'lag_days' | 'start_date' | 'end_date'>,
  today: Date = new Date()
): DateRange {
  const endDate = config.end_date ?? formatDate(shiftDays(today, -config.lag_days));
  const startDate = config.start_date ?? formatDate(shiftDays(new Date(`${endDate}T00:00:00Z`), -config.lookback_days));
  return { startDate, endDate };
}

export function isOrderedRange(range: DateRange): boolean {
  return range.startDate < range.endDate;
}
