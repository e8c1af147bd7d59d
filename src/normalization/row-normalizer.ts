import type { RawSearchAnalyticsRow, SearchAnalyticsPage } from '../gsc/types';
import type { KeywordRecord } from '../records/types';

export function normalizeRow(row: RawSearchAnalyticsRow): KeywordRecord {
  return {
    keys: [...(row.keys ?? [])],
    clicks: row.clicks ?? 0,
    impressions: row.impressions ?? 0,
    ctr: (row.ctr ?? 0) * 100,
    position: row.position ?? 0
  };
}

/**
 * Turns one Search Analytics page into keyword records, keeping row order.
 * A page without rows is a valid empty result.
 */
export function normalizeSearchAnalyticsRows(page: SearchAnalyticsPage): KeywordRecord[] {
  return (page.rows ?? []).map(normalizeRow);
}
