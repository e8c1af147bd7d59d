import type { SearchDimension } from '../config';
import type { DateRange } from '../utils/dates';

/** Search Console leaves any of these fields out (or null) when it has nothing to report. */
export interface RawSearchAnalyticsRow {
  keys?: string[] | null;
  clicks?: number | null;
  impressions?: number | null;
  /** Fraction, 0-1. */
  ctr?: number | null;
  position?: number | null;
}

export interface SearchAnalyticsPage {
  rows?: RawSearchAnalyticsRow[] | null;
  responseAggregationType?: string | null;
}

export interface SearchAnalyticsRequest extends DateRange {
  siteUrl: string;
  dimensions: SearchDimension[];
}

/**
 * Credentialed access to the search analytics API. Resolves with one page of
 * rows or rejects with a SearchAnalyticsFetchError.
 */
export type SearchAnalyticsQueryFn = (request: SearchAnalyticsRequest) => Promise<SearchAnalyticsPage>;
